/**
 * "3 days ago" style activity text
 */

const UNIT_MS: Record<string, number> = {
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000,
  month: 30 * 24 * 60 * 60 * 1000,
  year: 365 * 24 * 60 * 60 * 1000,
};

const RELATIVE_PATTERN = /(\d+)\s+(minute|hour|day|week|month|year)s?\s+ago/i;

/**
 * First relative timestamp in `text`, resolved against `now`
 */
export function parseRelativeActivity(text: string, now: Date = new Date()): Date | null {
  const match = text.match(RELATIVE_PATTERN);
  if (!match) return null;

  const amount = Number(match[1]);
  const unitMs = UNIT_MS[match[2].toLowerCase()];
  if (!Number.isFinite(amount) || unitMs === undefined) return null;

  return new Date(now.getTime() - amount * unitMs);
}
