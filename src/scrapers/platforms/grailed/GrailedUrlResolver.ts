/**
 * Grailed share-link resolver
 *
 * Links shared from the Grailed app point at *.app.link and carry a
 * base64url `data` query parameter whose JSON holds the canonical URL.
 * Anything that cannot be resolved is returned unchanged.
 */

import { isRecord } from "@/scrapers/common/HtmlExtract";

const GRAILED_DOMAIN = "grailed.com";
const GRAILED_ORIGIN = "https://www.grailed.com";
const APP_LINK_SUFFIX = ".app.link";

const CANDIDATE_KEYS = [
  "$canonical_url",
  "$fallback_url",
  "$desktop_url",
  "$og_url",
  "$canonical_identifier",
] as const;

export function isAppShareLink(url: string): boolean {
  try {
    return new URL(url).hostname.toLowerCase().endsWith(APP_LINK_SUFFIX);
  } catch {
    return false;
  }
}

function decodePayload(encoded: string): Record<string, unknown> | null {
  try {
    const json: unknown = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
    return isRecord(json) ? json : null;
  } catch {
    return null;
  }
}

function toGrailedUrl(candidate: string): string | null {
  const value = candidate.trim();
  if (value.startsWith("/")) {
    return new URL(value, GRAILED_ORIGIN).toString();
  }

  let parsed: URL;
  try {
    parsed = new URL(value.includes("://") ? value : `https://${value}`);
  } catch {
    return null;
  }
  if (!parsed.hostname.toLowerCase().includes(GRAILED_DOMAIN)) {
    return null;
  }
  return parsed.toString();
}

/**
 * Canonical grailed.com URL for a share link, or the input unchanged
 */
export function resolveGrailedUrl(url: string): string {
  const trimmed = url.trim();
  if (!isAppShareLink(trimmed)) {
    return trimmed;
  }

  const data = new URL(trimmed).searchParams.get("data");
  if (!data) return trimmed;

  const payload = decodePayload(data);
  if (!payload) return trimmed;

  for (const key of CANDIDATE_KEYS) {
    const value = payload[key];
    if (typeof value !== "string" || !value.trim()) continue;
    const resolved = toGrailedUrl(value);
    if (resolved) return resolved;
  }
  return trimmed;
}
