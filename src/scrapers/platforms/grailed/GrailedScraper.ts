/**
 * Grailed scraper
 *
 * Listings: HTTP fetch + cheerio, reading the Next.js `__NEXT_DATA__`
 * payload first and falling back to configured selectors and JSON-LD.
 *
 * Sellers: profile pages render client side, so they are loaded through a
 * pooled browser page and parsed from the rendered HTML.
 *
 * A seller lookup failing during a listing scrape leaves the seller null;
 * it never fails the listing.
 */

import { SCRAPER_CONFIG } from "@/config/constants";
import { createListingRecord } from "@/core/domain/ListingRecord";
import type { PlatformScraperConfig, SellerSelectors } from "@/core/domain/PlatformScraperConfig";
import { createSellerRecord, SellerRecord } from "@/core/domain/SellerRecord";
import { StructuralScrapeError } from "@/core/errors/AcquisitionErrors";
import type {
  ListingScrapeResult,
  ScrapeContext,
} from "@/core/interfaces/IPlatformScraper";
import { BaseScraper } from "@/scrapers/base/BaseScraper";
import {
  hasAny,
  HtmlDocument,
  isRecord,
  jsonLdPrice,
  loadHtml,
  readAllTexts,
  readField,
  readScriptJson,
} from "@/scrapers/common/HtmlExtract";
import { PriceParser } from "@/scrapers/common/PriceParser";
import { parseRelativeActivity } from "@/scrapers/common/RelativeTime";
import { resolveGrailedUrl } from "@/scrapers/platforms/grailed/GrailedUrlResolver";

const GRAILED_ORIGIN = "https://www.grailed.com";

const SELLER_USERNAME_PATTERNS = [
  /"(?:seller|user|owner)"\s*:\s*\{[^}]*"username"\s*:\s*"([^"]+)"/i,
  /"(?:sellerName|sellerUsername)"\s*:\s*"([^"]+)"/i,
];

export interface GrailedScraperOptions {
  navigationTimeoutMs?: number;
  defaultShipping?: number;
  /** Clock for resolving "N days ago" activity text */
  now?: () => Date;
}

export class GrailedScraper extends BaseScraper {
  private readonly navigationTimeoutMs: number;
  private readonly defaultShipping: number;
  private readonly now: () => Date;
  private readonly sellerSelectors: SellerSelectors;

  constructor(config: PlatformScraperConfig, options: GrailedScraperOptions = {}) {
    super(config);
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS;
    this.defaultShipping =
      options.defaultShipping ??
      config.listing.defaultShipping ??
      SCRAPER_CONFIG.GRAILED_DEFAULT_SHIPPING_USD;
    this.now = options.now ?? (() => new Date());
    this.sellerSelectors = config.seller ?? {
      rating: [],
      reviews: [],
      trustedBadge: [],
      profile: { reservedPaths: [], profilePrefixes: [] },
    };
  }

  /**
   * Share links are expanded; query string and fragment are dropped
   */
  override normalizeUrl(url: string): string {
    const resolved = resolveGrailedUrl(url);
    try {
      const parsed = new URL(resolved);
      return `${parsed.protocol}//${parsed.hostname}${parsed.pathname.replace(/\/+$/, "")}`;
    } catch {
      return resolved;
    }
  }

  /**
   * Profiles are single-segment paths that are not reserved pages
   * ("/some_seller"), or legacy "/users/..." style paths
   */
  override isProfileUrl(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(resolveGrailedUrl(url));
    } catch {
      return false;
    }
    if (!parsed.hostname.toLowerCase().includes("grailed.com")) {
      return false;
    }

    const path = parsed.pathname.toLowerCase().replace(/^\/+|\/+$/g, "");
    if (!path) return false;

    const { reservedPaths, profilePrefixes } = this.sellerSelectors.profile;
    if (!path.includes("/")) {
      return !path.startsWith("listings") && !reservedPaths.includes(path);
    }
    return profilePrefixes.some((prefix) => path.startsWith(`${prefix}/`));
  }

  protected async extractListing(
    url: string,
    ctx: ScrapeContext,
  ): Promise<ListingScrapeResult> {
    const target = this.normalizeUrl(url);
    const html = await ctx.fetchHtml(target);
    const $ = loadHtml(html);
    const nextListing = this.readNextListing($);

    const { price, buyable } = this.extractPriceAndBuyability($, nextListing);
    const title = this.extractTitle($, nextListing);
    if (price === null && title === null) {
      throw new StructuralScrapeError("No listing data found on Grailed page");
    }

    const listing = createListingRecord({
      price,
      buyable,
      title,
      shippingCostOrigin: this.extractShipping($, nextListing),
      imageRef: this.extractImage($, nextListing),
    });

    const sellerProfileUrl = this.extractSellerProfileUrl($, nextListing);
    let seller: SellerRecord | null = null;
    if (sellerProfileUrl) {
      try {
        seller = await this.extractSeller(sellerProfileUrl, ctx);
      } catch (error) {
        this.logScrapeWarning(ctx, sellerProfileUrl, "Seller lookup failed; continuing without seller", error);
      }
    }

    return { listing, seller, sellerProfileUrl };
  }

  protected override async extractSeller(
    url: string,
    ctx: ScrapeContext,
  ): Promise<SellerRecord | null> {
    const target = this.normalizeUrl(url);
    const html = await ctx.withPage(async (page) => {
      await page.goto(target, {
        waitUntil: "domcontentloaded",
        timeout: this.navigationTimeoutMs,
      });
      return page.content();
    });
    return this.parseSellerHtml(html);
  }

  /**
   * Seller metrics from a rendered profile page
   */
  parseSellerHtml(html: string): SellerRecord {
    const $ = loadHtml(html);
    const bodyText = $("body").text().replace(/\s+/g, " ");

    const trustedPattern = this.sellerSelectors.trustedTextPattern;
    const trustedBadge =
      hasAny($, this.sellerSelectors.trustedBadge) ||
      (trustedPattern !== undefined && new RegExp(trustedPattern, "i").test(bodyText));

    return createSellerRecord({
      averageRating: this.firstRating(readAllTexts($, this.sellerSelectors.rating)),
      reviewCount: this.firstReviewCount(readAllTexts($, this.sellerSelectors.reviews)),
      trustedBadge,
      lastActivityAt: parseRelativeActivity(bodyText, this.now()),
    });
  }

  private readNextListing($: HtmlDocument): Record<string, unknown> | null {
    const data = readScriptJson($, "script#__NEXT_DATA__");
    if (!isRecord(data) || !isRecord(data.props) || !isRecord(data.props.pageProps)) {
      return null;
    }
    const listing = data.props.pageProps.listing;
    return isRecord(listing) ? listing : null;
  }

  private extractPriceAndBuyability(
    $: HtmlDocument,
    next: Record<string, unknown> | null,
  ): { price: number | null; buyable: boolean } {
    let price: number | null = null;
    let buyable = false;

    if (next) {
      const rawPrice = next.price;
      if (typeof rawPrice === "number" || typeof rawPrice === "string") {
        price = PriceParser.parse(rawPrice);
      }

      const purchaseType = String(next.purchaseType ?? "").toLowerCase();
      const sellStyle = String(next.sellStyle ?? "").toLowerCase();
      buyable =
        Boolean(next.buyNowPrice) ||
        Boolean(next.hasBuyNowPrice) ||
        ["buy_it_now", "buy_now"].includes(purchaseType) ||
        ["buy_it_now", "buy_now"].includes(sellStyle);
      if (typeof next.buyNow === "boolean") {
        buyable = next.buyNow;
      }
    }

    if (price === null) {
      for (const selector of this.config.listing.price) {
        price = PriceParser.parse(readField($, [selector]));
        if (price !== null && price > 0) break;
      }
      if (price === null || price === 0) {
        price = jsonLdPrice($);
      }
      if (!next) {
        buyable = this.scriptBuyNowFlag($) ?? false;
      }
    }

    return { price, buyable };
  }

  private scriptBuyNowFlag($: HtmlDocument): boolean | null {
    for (const script of $("script").toArray()) {
      const match = $(script).text().match(/"buyNow"\s*:\s*(true|false)/);
      if (match) return match[1] === "true";
    }
    return null;
  }

  private extractShipping($: HtmlDocument, next: Record<string, unknown> | null): number {
    if (next && isRecord(next.shipping) && isRecord(next.shipping.us)) {
      const amount = next.shipping.us.amount;
      if (typeof amount === "number" || typeof amount === "string") {
        const parsed = PriceParser.parse(amount);
        if (parsed !== null) return parsed;
      }
    }

    for (const selector of this.config.listing.shipping) {
      const parsed = PriceParser.parseShipping(readField($, [selector]));
      if (parsed !== null) return parsed;
    }
    return this.defaultShipping;
  }

  private extractTitle($: HtmlDocument, next: Record<string, unknown> | null): string | null {
    if (next && typeof next.title === "string" && next.title.trim()) {
      return next.title.trim();
    }
    return readField($, this.config.listing.title);
  }

  private extractImage($: HtmlDocument, next: Record<string, unknown> | null): string | null {
    if (next) {
      for (const field of ["photos", "images", "image", "mainImage"]) {
        const value = next[field];
        const first = Array.isArray(value) ? value[0] : value;
        if (typeof first === "string" && first) return first;
        if (isRecord(first)) {
          const src = first.url ?? first.src;
          if (typeof src === "string" && src) return src;
        }
      }
    }
    return readField($, this.config.listing.image);
  }

  private extractSellerProfileUrl(
    $: HtmlDocument,
    next: Record<string, unknown> | null,
  ): string | null {
    if (next) {
      for (const field of ["seller", "user"]) {
        const owner = next[field];
        if (isRecord(owner) && typeof owner.username === "string" && owner.username.trim()) {
          return `${GRAILED_ORIGIN}/${encodeURIComponent(owner.username.trim())}`;
        }
      }
    }

    for (const script of $("script").toArray()) {
      const content = $(script).text();
      for (const pattern of SELLER_USERNAME_PATTERNS) {
        const match = content.match(pattern);
        const username = match?.[1]?.trim();
        if (username && username.length > 2) {
          return `${GRAILED_ORIGIN}/${encodeURIComponent(username)}`;
        }
      }
    }

    const href = $("a[href*='/users/'], a[href*='/sellers/']").first().attr("href");
    if (href) {
      return href.startsWith("/") ? `${GRAILED_ORIGIN}${href}` : href;
    }
    return null;
  }

  private firstRating(texts: string[]): number {
    for (const text of texts) {
      const match = text.match(/([0-5]\.\d)/);
      if (!match) continue;
      const rating = Number(match[1]);
      if (rating >= 0 && rating <= 5) return rating;
    }
    return 0;
  }

  private firstReviewCount(texts: string[]): number {
    for (const text of texts) {
      const match = text.match(/(\d[\d,]*)/);
      if (!match) continue;
      const count = Number(match[1].replace(/,/g, ""));
      if (Number.isInteger(count) && count > 0) return count;
    }
    return 0;
  }
}
