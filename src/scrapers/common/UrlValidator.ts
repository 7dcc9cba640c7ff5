/**
 * Marketplace URL validation
 *
 * Applied at the HTTP surface before anything is fetched.
 */

import { SCRAPER_CONFIG } from "@/config/constants";

export type UrlValidation =
  | { valid: true; url: string }
  | { valid: false; url: string; reason: string };

function hostMatches(hostname: string, domain: string): boolean {
  return hostname === domain || hostname.endsWith(`.${domain}`);
}

export function validateMarketplaceUrl(
  input: string,
  allowedDomains: readonly string[] = SCRAPER_CONFIG.ALLOWED_DOMAINS,
): UrlValidation {
  const url = input.trim();
  if (!url) {
    return { valid: false, url, reason: "URL is empty" };
  }
  if (url.length > SCRAPER_CONFIG.MAX_URL_LENGTH) {
    return {
      valid: false,
      url,
      reason: `URL exceeds ${SCRAPER_CONFIG.MAX_URL_LENGTH} characters`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, url, reason: "URL is malformed" };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { valid: false, url, reason: `Unsupported scheme: ${parsed.protocol}` };
  }

  const hostname = parsed.hostname.toLowerCase();
  if (!allowedDomains.some((domain) => hostMatches(hostname, domain))) {
    return { valid: false, url, reason: `Domain not allowed: ${hostname}` };
  }

  return { valid: true, url };
}

/**
 * Domain labels of a URL host ("www.ebay.co.uk" -> ["www", "ebay", "co", "uk"]),
 * empty for unparseable input
 */
export function hostLabels(url: string): string[] {
  try {
    return new URL(url).hostname.toLowerCase().split(".");
  } catch {
    return [];
  }
}
