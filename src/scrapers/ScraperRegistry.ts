/**
 * Platform scraper registry
 * Registry Pattern (ordered, first match wins)
 *
 * SOLID:
 * - SRP: maps URLs to scrapers
 * - OCP: marketplaces are added by registration, not by editing this file
 * - DIP: depends on IPlatformScraper
 */

import type { IPlatformScraper } from "@/core/interfaces/IPlatformScraper";
import type { PlatformId } from "@/core/domain/PlatformId";

export class ScraperRegistry {
  private readonly scrapers: IPlatformScraper[] = [];

  constructor(scrapers: IPlatformScraper[] = []) {
    scrapers.forEach((scraper) => this.register(scraper));
  }

  /**
   * Append a scraper; a second registration for the same platform is rejected
   */
  register(scraper: IPlatformScraper): void {
    if (this.has(scraper.platform)) {
      throw new Error(`Scraper already registered for platform: ${scraper.platform}`);
    }
    this.scrapers.push(scraper);
  }

  /**
   * First registered scraper whose supportsUrl accepts the URL
   */
  resolve(url: string): IPlatformScraper | null {
    return this.scrapers.find((scraper) => scraper.supportsUrl(url)) ?? null;
  }

  get(platform: PlatformId): IPlatformScraper {
    const scraper = this.scrapers.find((s) => s.platform === platform);
    if (!scraper) {
      throw new Error(
        `Scraper not found for platform: ${platform}. Available: [${this.platforms().join(", ")}]`,
      );
    }
    return scraper;
  }

  has(platform: PlatformId): boolean {
    return this.scrapers.some((s) => s.platform === platform);
  }

  platforms(): PlatformId[] {
    return this.scrapers.map((s) => s.platform);
  }

  size(): number {
    return this.scrapers.length;
  }
}
