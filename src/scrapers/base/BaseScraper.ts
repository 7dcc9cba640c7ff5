/**
 * Base platform scraper
 * Template Method Pattern
 *
 * SOLID:
 * - SRP: URL classification and logging shared by every marketplace
 * - LSP: subclasses only fill in the extraction steps
 */

import type { Logger } from "@/config/logger";
import type { PlatformId } from "@/core/domain/PlatformId";
import type { PlatformScraperConfig } from "@/core/domain/PlatformScraperConfig";
import type { SellerRecord } from "@/core/domain/SellerRecord";
import type {
  IPlatformScraper,
  ListingScrapeResult,
  ScrapeContext,
} from "@/core/interfaces/IPlatformScraper";
import { hostLabels } from "@/scrapers/common/UrlValidator";

export abstract class BaseScraper implements IPlatformScraper {
  readonly platform: PlatformId;

  protected constructor(protected readonly config: PlatformScraperConfig) {
    this.platform = config.platform;
  }

  /**
   * A URL belongs to the platform when one of its host labels matches
   * ("www.ebay.co.uk" carries "ebay")
   */
  supportsUrl(url: string): boolean {
    const labels = hostLabels(url);
    return this.config.domainLabels.some((label) => labels.includes(label));
  }

  isProfileUrl(_url: string): boolean {
    return false;
  }

  normalizeUrl(url: string): string {
    return url.trim();
  }

  async scrapeListing(url: string, ctx: ScrapeContext): Promise<ListingScrapeResult> {
    const startTime = Date.now();
    ctx.logger.debug({ platform: this.platform, url }, "Listing scrape started");
    const result = await this.extractListing(url, ctx);
    ctx.logger.debug(
      {
        platform: this.platform,
        url,
        price: result.listing.price,
        hasSeller: result.seller !== null,
        elapsedMs: Date.now() - startTime,
      },
      "Listing scrape finished",
    );
    return result;
  }

  async scrapeSeller(url: string, ctx: ScrapeContext): Promise<SellerRecord | null> {
    ctx.logger.debug({ platform: this.platform, url }, "Seller scrape started");
    return this.extractSeller(url, ctx);
  }

  protected abstract extractListing(
    url: string,
    ctx: ScrapeContext,
  ): Promise<ListingScrapeResult>;

  /** Platforms without seller pages keep this default */
  protected async extractSeller(
    url: string,
    ctx: ScrapeContext,
  ): Promise<SellerRecord | null> {
    ctx.logger.info({ platform: this.platform, url }, "Seller analysis not supported");
    return null;
  }

  protected logScrapeWarning(ctx: ScrapeContext, url: string, message: string, error?: unknown): void {
    ctx.logger.warn(
      {
        platform: this.platform,
        url,
        error: error instanceof Error ? error.message : error === undefined ? undefined : String(error),
      },
      message,
    );
  }
}
