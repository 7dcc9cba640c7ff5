/**
 * Grailed share-link resolver unit tests
 */

import { describe, it, expect } from "@jest/globals";
import { isAppShareLink, resolveGrailedUrl } from "@/scrapers/platforms/grailed/GrailedUrlResolver";

function shareLink(payload: unknown): string {
  const data = Buffer.from(JSON.stringify(payload)).toString("base64url");
  return `https://grailed.app.link/aBcD?data=${data}`;
}

describe("GrailedUrlResolver", () => {
  it("recognises app share links", () => {
    expect(isAppShareLink("https://grailed.app.link/aBcD")).toBe(true);
    expect(isAppShareLink("https://www.grailed.com/listings/1")).toBe(false);
    expect(isAppShareLink("not a url")).toBe(false);
  });

  it("returns ordinary URLs trimmed", () => {
    expect(resolveGrailedUrl("  https://www.grailed.com/listings/1  ")).toBe(
      "https://www.grailed.com/listings/1",
    );
  });

  it("takes the canonical URL from the payload", () => {
    expect(resolveGrailedUrl(shareLink({ $canonical_url: "https://www.grailed.com/listings/1-boots" }))).toBe(
      "https://www.grailed.com/listings/1-boots",
    );
  });

  it("skips candidates on other hosts", () => {
    const link = shareLink({
      $canonical_url: "https://example.com/listings/1",
      $fallback_url: "https://www.grailed.com/listings/5-coat",
    });
    expect(resolveGrailedUrl(link)).toBe("https://www.grailed.com/listings/5-coat");
  });

  it("joins relative paths and scheme-less hosts to grailed.com", () => {
    expect(resolveGrailedUrl(shareLink({ $desktop_url: "/listings/7-scarf" }))).toBe(
      "https://www.grailed.com/listings/7-scarf",
    );
    expect(resolveGrailedUrl(shareLink({ $og_url: "www.grailed.com/listings/8-hat" }))).toBe(
      "https://www.grailed.com/listings/8-hat",
    );
  });

  it("returns the link unchanged when the payload cannot be used", () => {
    const noData = "https://grailed.app.link/aBcD";
    const garbage = "https://grailed.app.link/aBcD?data=%%%";
    const noCandidates = shareLink({ $marketing_title: "Check this out" });

    expect(resolveGrailedUrl(noData)).toBe(noData);
    expect(resolveGrailedUrl(garbage)).toBe(garbage);
    expect(resolveGrailedUrl(noCandidates)).toBe(noCandidates);
  });
});
