/**
 * Platform scraper contract
 *
 * SOLID:
 * - OCP: new marketplaces register a new implementation
 * - DIP: scrapers receive I/O through ScrapeContext instead of owning it
 */

import type { Logger } from "@/config/logger";
import type { ListingRecord } from "@/core/domain/ListingRecord";
import type { PlatformId } from "@/core/domain/PlatformId";
import type { SellerRecord } from "@/core/domain/SellerRecord";

/**
 * The slice of a browser page scrapers rely on
 * (structurally satisfied by a Playwright Page)
 */
export interface BrowserPage {
  goto(
    url: string,
    options?: {
      waitUntil?: "load" | "domcontentloaded" | "networkidle" | "commit";
      timeout?: number;
    },
  ): Promise<unknown>;
  content(): Promise<string>;
}

/**
 * I/O handed to a scraper for one URL
 */
export interface ScrapeContext {
  /** Plain HTTP GET returning the body */
  fetchHtml(url: string): Promise<string>;
  /** Borrow a pooled browser page; released when `fn` settles */
  withPage<T>(fn: (page: BrowserPage) => Promise<T>): Promise<T>;
  logger: Logger;
}

export interface ListingScrapeResult {
  listing: ListingRecord;
  seller: SellerRecord | null;
  sellerProfileUrl: string | null;
}

export interface IPlatformScraper {
  readonly platform: PlatformId;
  supportsUrl(url: string): boolean;
  isProfileUrl(url: string): boolean;
  /** Canonical form used as the cache identifier */
  normalizeUrl(url: string): string;
  scrapeListing(url: string, ctx: ScrapeContext): Promise<ListingScrapeResult>;
  /** null when the platform exposes no seller data for the URL */
  scrapeSeller(url: string, ctx: ScrapeContext): Promise<SellerRecord | null>;
}
