/**
 * Network resource blocking policy for pooled browser contexts
 *
 * Applied by the session driver to every context it creates, so callers
 * cannot opt out. Pages load text and scripts only.
 */

/** Playwright resource types dropped outright */
export const BLOCKED_RESOURCE_TYPES: ReadonlySet<string> = new Set([
  "image",
  "media",
  "font",
]);

/** File extensions dropped regardless of reported resource type */
export const BLOCKED_EXTENSIONS: readonly string[] = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".svg",
  ".webp",
  ".ico",
  ".woff",
  ".woff2",
  ".ttf",
  ".eot",
  ".mp4",
  ".mp3",
  ".avi",
  ".mov",
  ".webm",
];

/** Telemetry hosts */
export const BLOCKED_HOST_FRAGMENTS: readonly string[] = [
  "google-analytics.com",
  "googletagmanager.com",
  "doubleclick.net",
  "facebook.net",
  "connect.facebook.com",
  "hotjar.com",
  "segment.io",
];

function pathnameOf(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.toLowerCase();
  }
}

/**
 * Whether a request should be aborted
 * @param url - request URL
 * @param resourceType - Playwright `request.resourceType()`
 */
export function shouldBlockRequest(url: string, resourceType: string): boolean {
  if (BLOCKED_RESOURCE_TYPES.has(resourceType)) {
    return true;
  }

  const lowered = url.toLowerCase();
  if (BLOCKED_HOST_FRAGMENTS.some((fragment) => lowered.includes(fragment))) {
    return true;
  }

  const pathname = pathnameOf(url);
  return BLOCKED_EXTENSIONS.some((ext) => pathname.endsWith(ext));
}
