/**
 * Acquisition orchestrator
 *
 * SOLID:
 * - SRP: per-URL routing, caching and admission for a batch of URLs
 * - DIP: registry, cache, pool, fetcher and analytics are injected
 *
 * Per URL:
 * 1. resolve a scraper (none -> unsupported_platform, no I/O)
 * 2. profile URLs go to the seller namespace, everything else to listing
 * 3. cache read, outside the semaphore
 * 4. on a miss, scrape inside the semaphore; identical URLs in flight
 *    share one scrape
 * 5. cache only outcomes that carry the data they were asked for
 * 6. hand the outcome to analytics (errors logged, never raised)
 *
 * Failures stay per URL. Outcomes come back in input order.
 */

import { Semaphore } from "async-mutex";
import { v4 as uuidv4 } from "uuid";
import { ACQUISITION_CONFIG, SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import type {
  AcquisitionFailure,
  AcquisitionKind,
  AcquisitionOutcome,
} from "@/core/domain/AcquisitionOutcome";
import { isCacheableOutcome } from "@/core/domain/AcquisitionOutcome";
import type { CallerIdentity } from "@/core/domain/CallerIdentity";
import { OutcomePlatform, UNKNOWN_PLATFORM } from "@/core/domain/PlatformId";
import {
  AcquisitionAbortedError,
  classifyError,
  UnsupportedPlatformError,
} from "@/core/errors/AcquisitionErrors";
import type { IAnalyticsSink } from "@/core/interfaces/IAnalyticsSink";
import type { CacheStats, ICacheStore } from "@/core/interfaces/ICacheStore";
import type {
  BrowserPage,
  IPlatformScraper,
  ScrapeContext,
} from "@/core/interfaces/IPlatformScraper";
import type { ISessionPool, PoolStats } from "@/core/interfaces/ISessionPool";
import type { ScraperRegistry } from "@/scrapers/ScraperRegistry";
import type { HtmlFetcher } from "@/scrapers/http/HtmlFetcher";
import { RequestCoalescer } from "@/services/RequestCoalescer";
import {
  createBatchLogger,
  createServiceLogger,
  errorMessage,
  logImportant,
} from "@/utils/LoggerContext";

export interface AcquisitionDependencies<TPage extends BrowserPage> {
  registry: ScraperRegistry;
  cache: ICacheStore;
  pool: ISessionPool<TPage>;
  fetcher: Pick<HtmlFetcher, "fetchHtml">;
  analytics: IAnalyticsSink;
}

export interface AcquisitionOptions {
  maxConcurrentUrls?: number;
  /** Share one scrape between identical URLs in flight (default true) */
  coalesceIdentical?: boolean;
  now?: () => number;
}

export interface AcquisitionStats {
  pool: PoolStats;
  cache: CacheStats;
  maxConcurrentUrls: number;
  scrapesInFlight: number;
}

/** Timing and source URL belong to each caller, not to a shared scrape */
type WithoutCallerFields<T> = T extends unknown ? Omit<T, "sourceUrl" | "elapsedMs"> : never;
type ScrapedOutcome = WithoutCallerFields<AcquisitionOutcome>;

export class AcquisitionOrchestrator<TPage extends BrowserPage> {
  private readonly logger: Logger;
  private readonly semaphore: Semaphore;
  private readonly maxConcurrentUrls: number;
  private readonly coalescer: RequestCoalescer<ScrapedOutcome>;
  private readonly coalesceIdentical: boolean;
  private readonly now: () => number;
  private closed = false;

  constructor(
    private readonly deps: AcquisitionDependencies<TPage>,
    options: AcquisitionOptions = {},
    parentLogger?: Logger,
  ) {
    this.logger = createServiceLogger(SERVICE_NAMES.ORCHESTRATOR, parentLogger);
    this.maxConcurrentUrls = Math.max(
      1,
      options.maxConcurrentUrls ?? ACQUISITION_CONFIG.MAX_CONCURRENT_URLS,
    );
    this.semaphore = new Semaphore(this.maxConcurrentUrls);
    this.coalescer = new RequestCoalescer<ScrapedOutcome>(this.logger);
    this.coalesceIdentical = options.coalesceIdentical ?? true;
    this.now = options.now ?? Date.now;
  }

  /**
   * Acquire every URL; one outcome per URL, in input order
   * @throws AcquisitionAbortedError after shutdown
   */
  async acquireMany(
    urls: readonly string[],
    caller: CallerIdentity,
  ): Promise<AcquisitionOutcome[]> {
    if (this.closed) {
      throw new AcquisitionAbortedError();
    }

    const batchId = uuidv4();
    const log = createBatchLogger(this.logger, batchId, caller.callerId);
    const startedAt = this.now();
    log.info({ urlCount: urls.length }, "Acquisition batch started");

    const outcomes = await Promise.all(
      urls.map(async (url) => {
        const outcome = await this.acquireOne(url, log);
        await this.recordAnalytics(outcome, caller, log);
        return outcome;
      }),
    );

    logImportant(log, "Acquisition batch finished", {
      urlCount: urls.length,
      succeeded: outcomes.filter((outcome) => outcome.success).length,
      fromCache: outcomes.filter((outcome) => outcome.servedFromCache).length,
      elapsedMs: this.now() - startedAt,
    });
    return outcomes;
  }

  async stats(): Promise<AcquisitionStats> {
    return {
      pool: this.deps.pool.stats(),
      cache: await this.deps.cache.stats(),
      maxConcurrentUrls: this.maxConcurrentUrls,
      scrapesInFlight: this.coalescer.inFlightCount(),
    };
  }

  /**
   * Refuse new batches. Batches already running finish against
   * whatever the pool still serves.
   */
  shutdown(): void {
    this.closed = true;
  }

  private async acquireOne(url: string, log: Logger): Promise<AcquisitionOutcome> {
    const startedAt = this.now();
    let scraper: IPlatformScraper | null;
    try {
      scraper = this.deps.registry.resolve(url);
    } catch (error) {
      log.warn({ url, error: errorMessage(error) }, "Scraper lookup failed");
      return {
        ...this.failure("listing", UNKNOWN_PLATFORM, error),
        sourceUrl: url,
        elapsedMs: this.now() - startedAt,
      };
    }
    if (!scraper) {
      log.warn({ url }, "No scraper for URL");
      return {
        ...this.failure("listing", UNKNOWN_PLATFORM, new UnsupportedPlatformError(url)),
        sourceUrl: url,
        elapsedMs: this.now() - startedAt,
      };
    }

    let kind: AcquisitionKind = "listing";
    let result: ScrapedOutcome;
    try {
      kind = scraper.isProfileUrl(url) ? "seller" : "listing";
      const identifier = scraper.normalizeUrl(url);
      const cached = await this.deps.cache.get(kind, identifier);
      if (cached) {
        log.debug({ url, kind }, "Served from cache");
        result = { ...cached, servedFromCache: true };
      } else {
        const scrape = () => this.scrapeAndStore(scraper, kind, url, identifier, log);
        result = this.coalesceIdentical
          ? await this.coalescer.getOrFetch(`${kind}:${identifier}`, scrape)
          : await scrape();
      }
    } catch (error) {
      result = this.failure(kind, scraper.platform, error);
    }

    if (!result.success) {
      log.warn({ url, kind, errorKind: result.errorKind, error: result.error }, "Acquisition failed");
    }
    return { ...result, sourceUrl: url, elapsedMs: this.now() - startedAt };
  }

  private async scrapeAndStore(
    scraper: IPlatformScraper,
    kind: AcquisitionKind,
    url: string,
    identifier: string,
    log: Logger,
  ): Promise<ScrapedOutcome> {
    const startedAt = this.now();
    let outcome: AcquisitionOutcome;
    try {
      outcome = await this.semaphore.runExclusive(async () => ({
        ...(await this.scrape(scraper, kind, identifier, log)),
        sourceUrl: url,
        elapsedMs: this.now() - startedAt,
      }));
    } catch (error) {
      return this.failure(kind, scraper.platform, error);
    }

    if (isCacheableOutcome(outcome)) {
      await this.deps.cache.set(kind, identifier, outcome);
    } else if (outcome.success) {
      log.info({ url, kind }, "Outcome lacks required data; not cached");
    }
    return outcome;
  }

  private async scrape(
    scraper: IPlatformScraper,
    kind: AcquisitionKind,
    identifier: string,
    log: Logger,
  ): Promise<ScrapedOutcome> {
    const ctx = this.scrapeContext(log);
    if (kind === "seller") {
      const seller = await scraper.scrapeSeller(identifier, ctx);
      return {
        kind,
        platform: scraper.platform,
        success: true,
        listing: null,
        seller,
        sellerProfileUrl: identifier,
        servedFromCache: false,
      };
    }

    const { listing, seller, sellerProfileUrl } = await scraper.scrapeListing(identifier, ctx);
    return {
      kind,
      platform: scraper.platform,
      success: true,
      listing,
      seller,
      sellerProfileUrl,
      servedFromCache: false,
    };
  }

  private scrapeContext(log: Logger): ScrapeContext {
    return {
      fetchHtml: (target) => this.deps.fetcher.fetchHtml(target),
      withPage: (fn) => this.deps.pool.withSession(fn),
      logger: log,
    };
  }

  private failure(
    kind: AcquisitionKind,
    platform: OutcomePlatform,
    error: unknown,
  ): WithoutCallerFields<AcquisitionFailure> {
    return {
      kind,
      platform,
      success: false,
      error: errorMessage(error),
      errorKind: classifyError(error),
      servedFromCache: false,
    };
  }

  private async recordAnalytics(
    outcome: AcquisitionOutcome,
    caller: CallerIdentity,
    log: Logger,
  ): Promise<void> {
    try {
      await this.deps.analytics.record(outcome, caller);
    } catch (error) {
      log.warn({ url: outcome.sourceUrl, error: errorMessage(error) }, "Analytics sink failed");
    }
  }
}
