/**
 * Resource blocking policy unit tests
 */

import { describe, it, expect } from "@jest/globals";
import { shouldBlockRequest } from "@/config/ResourceBlocking";

describe("shouldBlockRequest", () => {
  it("blocks images, media and fonts by resource type", () => {
    expect(shouldBlockRequest("https://www.grailed.com/photo", "image")).toBe(true);
    expect(shouldBlockRequest("https://www.grailed.com/clip", "media")).toBe(true);
    expect(shouldBlockRequest("https://www.grailed.com/font", "font")).toBe(true);
  });

  it("blocks by file extension whatever the reported type", () => {
    expect(shouldBlockRequest("https://cdn.example.test/a/b.WOFF2?v=3", "other")).toBe(true);
    expect(shouldBlockRequest("https://cdn.example.test/hero.webp", "fetch")).toBe(true);
  });

  it("blocks telemetry hosts", () => {
    expect(shouldBlockRequest("https://www.googletagmanager.com/gtm.js", "script")).toBe(true);
    expect(shouldBlockRequest("https://static.hotjar.com/c/hotjar.js", "script")).toBe(true);
  });

  it("lets documents, scripts and API calls through", () => {
    expect(shouldBlockRequest("https://www.grailed.com/archive_dealer", "document")).toBe(false);
    expect(shouldBlockRequest("https://www.grailed.com/_next/static/app.js", "script")).toBe(false);
    expect(shouldBlockRequest("https://www.grailed.com/api/users/9", "xhr")).toBe(false);
  });
});
