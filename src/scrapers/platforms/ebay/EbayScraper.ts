/**
 * eBay scraper
 *
 * Plain HTTP fetch + cheerio. Price comes from the configured selectors,
 * then from JSON-LD offers. eBay has no seller pages here, so profile
 * detection is always false and seller lookups return null.
 */

import { createListingRecord } from "@/core/domain/ListingRecord";
import type { PlatformScraperConfig } from "@/core/domain/PlatformScraperConfig";
import { StructuralScrapeError } from "@/core/errors/AcquisitionErrors";
import type {
  ListingScrapeResult,
  ScrapeContext,
} from "@/core/interfaces/IPlatformScraper";
import { BaseScraper } from "@/scrapers/base/BaseScraper";
import {
  HtmlDocument,
  jsonLdPrice,
  loadHtml,
  readField,
} from "@/scrapers/common/HtmlExtract";
import { PriceParser } from "@/scrapers/common/PriceParser";

export class EbayScraper extends BaseScraper {
  constructor(config: PlatformScraperConfig) {
    super(config);
  }

  /**
   * Strips tracking query parameters: /itm/<id> is the identity of a listing
   */
  override normalizeUrl(url: string): string {
    try {
      const parsed = new URL(url.trim());
      const itemMatch = parsed.pathname.match(/\/itm\/(?:[^/]+\/)?(\d+)/);
      if (itemMatch) {
        return `${parsed.protocol}//${parsed.hostname}/itm/${itemMatch[1]}`;
      }
      return `${parsed.protocol}//${parsed.hostname}${parsed.pathname}`;
    } catch {
      return url.trim();
    }
  }

  protected async extractListing(
    url: string,
    ctx: ScrapeContext,
  ): Promise<ListingScrapeResult> {
    const html = await ctx.fetchHtml(url);
    const $ = loadHtml(html);

    const price = this.extractPrice($);
    const title = readField($, this.config.listing.title);
    if (price === null && title === null) {
      throw new StructuralScrapeError("No listing data found on eBay page");
    }

    return {
      listing: createListingRecord({
        price,
        shippingCostOrigin: this.extractShipping($),
        // eBay listings with a price can be bought outright
        buyable: price !== null,
        title,
        imageRef: readField($, this.config.listing.image),
      }),
      seller: null,
      sellerProfileUrl: null,
    };
  }

  private extractPrice($: HtmlDocument): number | null {
    for (const selector of this.config.listing.price) {
      const price = PriceParser.parse(readField($, [selector]));
      if (price !== null && price > 0) return price;
    }
    return jsonLdPrice($);
  }

  private extractShipping($: HtmlDocument): number | null {
    for (const selector of this.config.listing.shipping) {
      const shipping = PriceParser.parseShipping(readField($, [selector]));
      if (shipping !== null) return shipping;
    }

    const freePattern = this.config.listing.freeShippingPattern;
    if (freePattern && new RegExp(freePattern, "i").test($("body").text())) {
      return 0;
    }
    return null;
  }
}
