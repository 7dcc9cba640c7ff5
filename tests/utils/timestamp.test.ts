/**
 * Timestamp utility unit tests (independent of the process TZ)
 */

import { describe, it, expect } from "@jest/globals";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

const LOCAL_MOMENT = new Date(2026, 0, 5, 7, 8, 9, 12);

describe("timestamp utilities", () => {
  it("formats local wall-clock time with the zone offset", () => {
    const formatted = getTimestampWithTimezone(LOCAL_MOMENT);

    expect(formatted).toMatch(/^2026-01-05T07:08:09\.012[+-]\d{2}:\d{2}$/);
    expect(Date.parse(formatted)).toBe(LOCAL_MOMENT.getTime());
  });

  it("formats the local date for log directories", () => {
    expect(getDateStringWithDash(LOCAL_MOMENT)).toBe("2026-01-05");
  });
});
