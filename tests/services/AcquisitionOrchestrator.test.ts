/**
 * AcquisitionOrchestrator unit tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import type { CallerIdentity } from "@/core/domain/CallerIdentity";
import { createSellerRecord } from "@/core/domain/SellerRecord";
import {
  AcquisitionAbortedError,
  PoolTimeoutError,
  StructuralScrapeError,
  TransientNetworkError,
} from "@/core/errors/AcquisitionErrors";
import type { BrowserPage } from "@/core/interfaces/IPlatformScraper";
import { ScraperRegistry } from "@/scrapers/ScraperRegistry";
import {
  AcquisitionOptions,
  AcquisitionOrchestrator,
} from "@/services/AcquisitionOrchestrator";
import { RedisCacheStore } from "@/services/cache/RedisCacheStore";
import { InMemoryCacheBackend } from "../helpers/InMemoryCacheBackend";
import {
  deferred,
  FakePagePool,
  FakeScraper,
  flushAsync,
  listingResult,
  RecordingAnalyticsSink,
  silentLogger,
  StaticFetcher,
} from "../helpers/fakes";

const EBAY_URL = "https://www.ebay.com/itm/111";
const GRAILED_URL = "https://www.grailed.com/listings/222-jacket";
const PROFILE_URL = "https://www.grailed.com/u/some_seller";
const caller: CallerIdentity = { callerId: "42", username: "tester" };

describe("AcquisitionOrchestrator", () => {
  let ebay: FakeScraper;
  let grailed: FakeScraper;
  let backend: InMemoryCacheBackend;
  let cache: RedisCacheStore;
  let pool: FakePagePool;
  let analytics: RecordingAnalyticsSink;

  function createOrchestrator(options: AcquisitionOptions = {}): AcquisitionOrchestrator<BrowserPage> {
    return new AcquisitionOrchestrator<BrowserPage>(
      {
        registry: new ScraperRegistry([ebay, grailed]),
        cache,
        pool,
        fetcher: new StaticFetcher(),
        analytics,
      },
      options,
      silentLogger,
    );
  }

  beforeEach(() => {
    ebay = new FakeScraper("ebay", "ebay.com");
    grailed = new FakeScraper("grailed", "grailed.com");
    backend = new InMemoryCacheBackend();
    cache = new RedisCacheStore(backend, { enabled: true, keyPrefix: "test" }, silentLogger);
    pool = new FakePagePool();
    analytics = new RecordingAnalyticsSink();
  });

  it("returns one outcome per URL in input order", async () => {
    const outcomes = await createOrchestrator().acquireMany(
      [GRAILED_URL, "https://example.com/item/1", EBAY_URL],
      caller,
    );

    expect(outcomes.map((outcome) => [outcome.sourceUrl, outcome.platform, outcome.success])).toEqual([
      [GRAILED_URL, "grailed", true],
      ["https://example.com/item/1", "unknown", false],
      [EBAY_URL, "ebay", true],
    ]);
  });

  it("reports unsupported platforms without scraping", async () => {
    const [outcome] = await createOrchestrator().acquireMany(["https://example.com/item/1"], caller);

    expect(outcome).toMatchObject({
      success: false,
      platform: "unknown",
      kind: "listing",
      errorKind: "unsupported_platform",
      error: "Unsupported platform: https://example.com/item/1",
      servedFromCache: false,
    });
    expect(ebay.listingCalls).toHaveLength(0);
    expect(grailed.listingCalls).toHaveLength(0);
  });

  it("serves a repeated listing from the cache", async () => {
    const orchestrator = createOrchestrator();

    const [first] = await orchestrator.acquireMany([EBAY_URL], caller);
    const [second] = await orchestrator.acquireMany([EBAY_URL], caller);

    expect(first).toMatchObject({ success: true, servedFromCache: false });
    expect(second).toMatchObject({
      success: true,
      servedFromCache: true,
      sourceUrl: EBAY_URL,
      listing: { price: 100, title: "Jacket" },
    });
    expect(ebay.listingCalls).toEqual([EBAY_URL]);
  });

  it("does not cache a listing without a price", async () => {
    ebay.onListing = async () => listingResult({ price: null, buyable: false });
    const orchestrator = createOrchestrator();

    await orchestrator.acquireMany([EBAY_URL], caller);
    const [second] = await orchestrator.acquireMany([EBAY_URL], caller);

    expect(second).toMatchObject({ success: true, servedFromCache: false, listing: { price: null } });
    expect(ebay.listingCalls).toHaveLength(2);
  });

  it("routes profile URLs to seller analysis and caches sellers", async () => {
    grailed.onSeller = async () => createSellerRecord({ reviewCount: 8, averageRating: 4.9 });
    const orchestrator = createOrchestrator();

    const [first] = await orchestrator.acquireMany([PROFILE_URL], caller);
    const [second] = await orchestrator.acquireMany([PROFILE_URL], caller);

    expect(first).toMatchObject({
      success: true,
      kind: "seller",
      listing: null,
      seller: { reviewCount: 8, averageRating: 4.9 },
      sellerProfileUrl: PROFILE_URL,
    });
    expect(second).toMatchObject({ kind: "seller", servedFromCache: true });
    expect(grailed.sellerCalls).toEqual([PROFILE_URL]);
    expect(grailed.listingCalls).toHaveLength(0);
  });

  it("does not cache a seller lookup that found no seller", async () => {
    const orchestrator = createOrchestrator();

    const [first] = await orchestrator.acquireMany([PROFILE_URL], caller);
    await orchestrator.acquireMany([PROFILE_URL], caller);

    expect(first).toMatchObject({ success: true, seller: null });
    expect(grailed.sellerCalls).toHaveLength(2);
  });

  it("isolates failures to their own URL and tags the error kind", async () => {
    ebay.onListing = async () => {
      throw new TransientNetworkError("Rate limit exceeded", 429);
    };
    grailed.onListing = async () => {
      throw new Error("unexpected token");
    };

    const outcomes = await createOrchestrator().acquireMany(
      [EBAY_URL, GRAILED_URL, PROFILE_URL],
      caller,
    );

    expect(outcomes[0]).toMatchObject({ success: false, errorKind: "network", error: "Rate limit exceeded" });
    expect(outcomes[1]).toMatchObject({ success: false, errorKind: "internal", error: "unexpected token" });
    expect(outcomes[2]).toMatchObject({ success: true, kind: "seller" });
  });

  it("keeps the batch going when URL classification throws", async () => {
    ebay = new (class extends FakeScraper {
      isProfileUrl(url: string): boolean {
        if (url.endsWith("/bad")) throw new Error("profile check failed");
        return super.isProfileUrl(url);
      }
    })("ebay", "ebay.com");

    const outcomes = await createOrchestrator().acquireMany(
      ["https://www.ebay.com/itm/1", "https://www.ebay.com/itm/bad", "https://www.ebay.com/itm/3"],
      caller,
    );

    expect(outcomes.map((outcome) => outcome.success)).toEqual([true, false, true]);
    expect(outcomes[1]).toMatchObject({
      platform: "ebay",
      kind: "listing",
      errorKind: "internal",
      error: "profile check failed",
      sourceUrl: "https://www.ebay.com/itm/bad",
    });
    expect(analytics.records).toHaveLength(3);
  });

  it("keeps the batch going when scraper lookup throws", async () => {
    ebay = new (class extends FakeScraper {
      supportsUrl(url: string): boolean {
        if (url.endsWith("/bad")) throw new Error("host check failed");
        return super.supportsUrl(url);
      }
    })("ebay", "ebay.com");

    const outcomes = await createOrchestrator().acquireMany(
      ["https://www.ebay.com/itm/bad", GRAILED_URL],
      caller,
    );

    expect(outcomes[0]).toMatchObject({
      success: false,
      platform: "unknown",
      errorKind: "internal",
      error: "host check failed",
    });
    expect(outcomes[1]).toMatchObject({ success: true, platform: "grailed" });
  });

  it("always returns the browser session, even when extraction throws", async () => {
    grailed.onSeller = async (url, ctx) =>
      ctx.withPage(async (page) => {
        await page.goto(url);
        throw new StructuralScrapeError("profile markup changed");
      });

    const [outcome] = await createOrchestrator().acquireMany([PROFILE_URL], caller);

    expect(outcome).toMatchObject({ success: false, errorKind: "structural" });
    expect(pool.visited).toEqual([PROFILE_URL]);
    expect(pool.acquired).toBe(1);
    expect(pool.released).toBe(1);
  });

  it("reports pool failures as pool_unavailable", async () => {
    pool.acquireFailure = new PoolTimeoutError(5000);
    grailed.onSeller = async (url, ctx) => ctx.withPage(async () => null);

    const [outcome] = await createOrchestrator().acquireMany([PROFILE_URL], caller);

    expect(outcome).toMatchObject({
      success: false,
      errorKind: "pool_unavailable",
      error: "Timed out after 5000ms waiting for a browser session",
    });
  });

  it("records every outcome with the caller and survives a failing sink", async () => {
    analytics.failWith = new Error("sink offline");

    const outcomes = await createOrchestrator().acquireMany(
      [EBAY_URL, "https://example.com/item/1"],
      caller,
    );

    expect(outcomes).toHaveLength(2);
    expect(analytics.records).toHaveLength(2);
    expect(analytics.records.map((record) => record.outcome.sourceUrl).sort()).toEqual(
      [EBAY_URL, "https://example.com/item/1"].sort(),
    );
    expect(analytics.records.every((record) => record.caller === caller)).toBe(true);
  });

  it("bounds concurrent scrapes across the batch", async () => {
    const gate = deferred<void>();
    let active = 0;
    let maxActive = 0;
    ebay.onListing = async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await gate.promise;
      active--;
      return listingResult();
    };

    const urls = [1, 2, 3, 4, 5].map((id) => `https://www.ebay.com/itm/${id}`);
    const batch = createOrchestrator({ maxConcurrentUrls: 2 }).acquireMany(urls, caller);
    await flushAsync();

    expect(active).toBe(2);
    gate.resolve();
    const outcomes = await batch;

    expect(maxActive).toBe(2);
    expect(outcomes.every((outcome) => outcome.success)).toBe(true);
  });

  it("shares one scrape between identical URLs in flight", async () => {
    const gate = deferred<void>();
    ebay.onListing = async () => {
      await gate.promise;
      return listingResult({ price: 75 });
    };

    const batch = createOrchestrator().acquireMany([EBAY_URL, `${EBAY_URL}?hash=abc`], caller);
    await flushAsync();
    gate.resolve();
    const outcomes = await batch;

    expect(ebay.listingCalls).toHaveLength(1);
    expect(outcomes.map((outcome) => outcome.sourceUrl)).toEqual([EBAY_URL, `${EBAY_URL}?hash=abc`]);
    expect(outcomes.every((outcome) => outcome.success)).toBe(true);
  });

  it("scrapes identical URLs separately when coalescing is off", async () => {
    await createOrchestrator({ coalesceIdentical: false }).acquireMany([EBAY_URL, EBAY_URL], caller);

    expect(ebay.listingCalls).toHaveLength(2);
  });

  it("keeps scraping when the cache backend is down", async () => {
    backend.failWith = new Error("ECONNREFUSED");

    const [outcome] = await createOrchestrator().acquireMany([EBAY_URL], caller);

    expect(outcome).toMatchObject({ success: true, servedFromCache: false });
  });

  it("refuses new batches after shutdown", async () => {
    const orchestrator = createOrchestrator();
    orchestrator.shutdown();

    await expect(orchestrator.acquireMany([EBAY_URL], caller)).rejects.toBeInstanceOf(
      AcquisitionAbortedError,
    );
  });

  it("exposes pool and cache stats", async () => {
    const stats = await createOrchestrator({ maxConcurrentUrls: 3 }).stats();

    expect(stats).toMatchObject({
      maxConcurrentUrls: 3,
      scrapesInFlight: 0,
      pool: { initialized: true },
      cache: { enabled: true, connected: true },
    });
  });
});
