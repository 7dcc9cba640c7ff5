/**
 * Platform identifiers
 *
 * SOLID:
 * - OCP: adding a marketplace means adding an entry here and a scraper
 */

export const PLATFORM_IDS = {
  EBAY: "ebay",
  GRAILED: "grailed",
} as const;

export type PlatformId = (typeof PLATFORM_IDS)[keyof typeof PLATFORM_IDS];

/** Reported on outcomes whose URL no registered scraper claims */
export const UNKNOWN_PLATFORM = "unknown" as const;

export type OutcomePlatform = PlatformId | typeof UNKNOWN_PLATFORM;

export function isValidPlatformId(value: string): value is PlatformId {
  return Object.values<string>(PLATFORM_IDS).includes(value);
}
