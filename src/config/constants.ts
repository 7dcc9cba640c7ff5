/**
 * Application constants
 *
 * Environment-driven settings:
 * - every value falls back to a default when its variable is unset
 * - groups are `as const` so consumers get literal types
 */

import "dotenv/config";

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  return raw === "true" || raw === "1";
}

/**
 * Application metadata
 *
 * VERSION is kept in step with package.json by hand.
 */
export const APP_METADATA = {
  VERSION: "1.0.0",
  NAME: "Listing Scanner",
  ARCHITECTURE: "API v1 with platform scraper registry",
} as const;

/**
 * Logical service names, used for log file routing
 */
export const SERVICE_NAMES = {
  SERVER: "server",
  ORCHESTRATOR: "acquisition-orchestrator",
  BROWSER_POOL: "browser-pool",
  CACHE: "cache-store",
  COALESCER: "request-coalescer",
  CURRENCY: "currency-rates",
  SCRAPER: "scraper",
  ANALYTICS: "analytics",
  ADVISORY: "seller-advisory",
} as const;

export type ServiceName = (typeof SERVICE_NAMES)[keyof typeof SERVICE_NAMES];

/**
 * HTTP server
 */
export const SERVER_CONFIG = {
  PORT: envNumber("PORT", 3000),
  /** Upper bound of URLs per acquisition request */
  MAX_URLS_PER_REQUEST: envNumber("MAX_URLS_PER_REQUEST", 20),
  /** Grace period before a forced exit on SIGTERM / SIGINT */
  SHUTDOWN_TIMEOUT_MS: envNumber("SHUTDOWN_TIMEOUT_MS", 10000),
} as const;

/**
 * Redis-backed cache store
 */
export const CACHE_CONFIG = {
  ENABLED: envBoolean("CACHE_ENABLED", true),
  REDIS_HOST: process.env.REDIS_HOST || "localhost",
  REDIS_PORT: envNumber("REDIS_PORT", 6379),
  REDIS_PASSWORD: process.env.REDIS_PASSWORD || undefined,
  REDIS_DB: envNumber("REDIS_DB", 0),
  /** Key namespace shared by every entry this service writes */
  KEY_PREFIX: process.env.CACHE_KEY_PREFIX || "listing_scanner",
  /** Per-operation timeout; a slow Redis reads as a miss */
  COMMAND_TIMEOUT_MS: envNumber("REDIS_COMMAND_TIMEOUT_MS", 2000),
  TTL_SECONDS: {
    listing: envNumber("CACHE_TTL_LISTING_SECONDS", 86400),
    seller: envNumber("CACHE_TTL_SELLER_SECONDS", 43200),
    rate: envNumber("CACHE_TTL_RATE_SECONDS", 43200),
  },
  /** SCAN batch size for pattern invalidation */
  SCAN_COUNT: 100,
} as const;

/**
 * Browser session pool
 */
export const POOL_CONFIG = {
  /** Engines (browser processes) pre-warmed at startup */
  ENGINES: envNumber("POOL_ENGINES", 3),
  /** Contexts pre-warmed per engine */
  CONTEXTS_PER_ENGINE: envNumber("POOL_CONTEXTS_PER_ENGINE", 5),
  /** Hard ceiling on engines, including ones launched on demand */
  MAX_ENGINES: envNumber("POOL_MAX_ENGINES", 3),
  /** Concurrent lease bound; 0 means ENGINES * CONTEXTS_PER_ENGINE */
  MAX_SESSIONS: envNumber("POOL_MAX_SESSIONS", 0),
  /** 0 waits indefinitely */
  ACQUIRE_TIMEOUT_MS: envNumber("POOL_ACQUIRE_TIMEOUT_MS", 0),
  HEADLESS: process.env.HEADLESS !== "false",
  /** Run `playwright install chromium` once when the binary is missing */
  AUTO_INSTALL: envBoolean("POOL_AUTO_INSTALL", true),
  VIEWPORT: { width: 1280, height: 720 },
  LOCALE: "en-US",
} as const;

/**
 * Acquisition orchestrator
 */
export const ACQUISITION_CONFIG = {
  /** Outbound scrapes allowed in flight across all callers */
  MAX_CONCURRENT_URLS: envNumber("MAX_CONCURRENT_URLS", 5),
} as const;

/**
 * Scraper defaults
 */
export const SCRAPER_CONFIG = {
  /** Plain HTTP fetch timeout */
  HTTP_TIMEOUT_MS: envNumber("SCRAPER_HTTP_TIMEOUT_MS", 15000),
  /** Page navigation timeout for browser-backed extraction */
  NAVIGATION_TIMEOUT_MS: envNumber("SCRAPER_NAVIGATION_TIMEOUT_MS", 10000),
  /** Selector wait inside a loaded page */
  SELECTOR_TIMEOUT_MS: envNumber("SCRAPER_SELECTOR_TIMEOUT_MS", 3000),
  DEFAULT_USER_AGENT:
    process.env.SCRAPER_USER_AGENT ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  /** Shipping assumed when a Grailed listing carries no US rate */
  GRAILED_DEFAULT_SHIPPING_USD: envNumber("GRAILED_DEFAULT_SHIPPING_USD", 15),
  MAX_URL_LENGTH: 2048,
  ALLOWED_DOMAINS: ["ebay.com", "grailed.com", "app.link"] as const,
} as const;

/**
 * Exchange rates
 */
export const CURRENCY_CONFIG = {
  CBR_DAILY_URL:
    process.env.CBR_DAILY_URL || "https://www.cbr.ru/scripts/XML_daily.asp",
  REQUEST_TIMEOUT_MS: envNumber("CURRENCY_REQUEST_TIMEOUT_MS", 10000),
  /** Markup applied when converting into roubles */
  MARKUP_PERCENT: envNumber("CURRENCY_MARKUP_PERCENT", 5),
  /** How long the last good rate may stand in for an unreachable source */
  FALLBACK_MAX_AGE_MS: envNumber("CURRENCY_FALLBACK_MAX_AGE_MS", 24 * 60 * 60 * 1000),
  BASE_CURRENCY: "RUB",
} as const;

/**
 * Seller advisory thresholds
 */
export const ADVISORY_CONFIG = {
  /** Ratings at or below this (with at least one review) are flagged */
  LOW_RATING_THRESHOLD: envNumber("ADVISORY_LOW_RATING_THRESHOLD", 4.6),
} as const;
