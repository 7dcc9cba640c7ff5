/**
 * ScraperRegistry unit tests
 */

import { describe, it, expect } from "@jest/globals";
import { ScraperRegistry } from "@/scrapers/ScraperRegistry";
import { FakeScraper } from "../helpers/fakes";

describe("ScraperRegistry", () => {
  it("resolves the first scraper that supports the URL", () => {
    const ebay = new FakeScraper("ebay", "ebay.com");
    const greedy = new FakeScraper("grailed", ".com");
    const registry = new ScraperRegistry([ebay, greedy]);

    expect(registry.resolve("https://www.ebay.com/itm/1")).toBe(ebay);
    expect(registry.resolve("https://www.grailed.com/listings/1")).toBe(greedy);
  });

  it("returns null when nothing supports the URL", () => {
    const registry = new ScraperRegistry([new FakeScraper("ebay", "ebay.com")]);

    expect(registry.resolve("https://example.org/item")).toBeNull();
  });

  it("rejects a second scraper for the same platform", () => {
    const registry = new ScraperRegistry([new FakeScraper("ebay", "ebay.com")]);

    expect(() => registry.register(new FakeScraper("ebay", "ebay.de"))).toThrow(
      "Scraper already registered for platform: ebay",
    );
  });

  it("looks scrapers up by platform", () => {
    const grailed = new FakeScraper("grailed", "grailed.com");
    const registry = new ScraperRegistry([grailed]);

    expect(registry.get("grailed")).toBe(grailed);
    expect(registry.has("ebay")).toBe(false);
    expect(registry.platforms()).toEqual(["grailed"]);
    expect(registry.size()).toBe(1);
    expect(() => registry.get("ebay")).toThrow("Scraper not found for platform: ebay. Available: [grailed]");
  });
});
