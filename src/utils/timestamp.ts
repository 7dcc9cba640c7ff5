/**
 * Timestamp utilities
 *
 * SOLID:
 * - SRP: timestamp formatting only
 */

/**
 * ISO 8601 timestamp carrying the local timezone offset
 * (e.g. 2025-10-30T12:34:56.789+09:00)
 *
 * The offset follows the process TZ, so a container started with
 * TZ=Europe/Moscow logs +03:00.
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  const hours = String(now.getHours()).padStart(2, "0");
  const minutes = String(now.getMinutes()).padStart(2, "0");
  const seconds = String(now.getSeconds()).padStart(2, "0");
  const milliseconds = String(now.getMilliseconds()).padStart(3, "0");

  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${milliseconds}${offsetSign}${String(offsetHours).padStart(2, "0")}:${String(offsetMinutes).padStart(2, "0")}`;
}

/**
 * YYYY-MM-DD in local time, used for dated log directories
 */
export function getDateStringWithDash(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
