/**
 * HTML fetcher
 *
 * Native fetch with browser-like headers and a hard timeout. No retries:
 * the caller's batch decides what to do with a failed URL.
 *
 * Error mapping:
 * - 404 -> StructuralScrapeError
 * - 429, 5xx, timeout, connection failure -> TransientNetworkError
 */

import { SCRAPER_CONFIG } from "@/config/constants";
import {
  StructuralScrapeError,
  TransientNetworkError,
} from "@/core/errors/AcquisitionErrors";

export type FetchImpl = typeof fetch;

export interface HtmlFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchImpl;
}

export function browserLikeHeaders(userAgent: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    "Cache-Control": "no-cache",
    "Upgrade-Insecure-Requests": "1",
  };
}

export class HtmlFetcher {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchImpl;

  constructor(options: HtmlFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? SCRAPER_CONFIG.HTTP_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? SCRAPER_CONFIG.DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchHtml(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: browserLikeHeaders(this.userAgent),
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError")
      ) {
        throw new TransientNetworkError(`Request timeout after ${this.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`Request failed: ${message}`, undefined, { cause: error });
    }

    if (response.status === 404) {
      throw new StructuralScrapeError("Page not found (deleted or unavailable)");
    }
    if (response.status === 429) {
      throw new TransientNetworkError("Rate limit exceeded", 429);
    }
    if (response.status >= 500) {
      throw new TransientNetworkError(`Server error: ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new StructuralScrapeError(`HTTP ${response.status}: ${response.statusText}`);
    }

    return response.text();
  }
}
