/**
 * SellerAdvisoryService unit tests
 */

import { describe, it, expect } from "@jest/globals";
import type { AcquisitionSuccess } from "@/core/domain/AcquisitionOutcome";
import { createListingRecord } from "@/core/domain/ListingRecord";
import { createSellerRecord } from "@/core/domain/SellerRecord";
import { ADVISORY_MESSAGES, SellerAdvisoryService } from "@/services/SellerAdvisoryService";

const service = new SellerAdvisoryService(4.6);
const buyable = createListingRecord({ price: 300, buyable: true });
const offerOnly = createListingRecord({ price: 300, buyable: false });

function success(fields: Partial<AcquisitionSuccess>): AcquisitionSuccess {
  return {
    kind: "listing",
    platform: "grailed",
    sourceUrl: "https://www.grailed.com/listings/1",
    elapsedMs: 10,
    success: true,
    listing: buyable,
    seller: null,
    sellerProfileUrl: null,
    servedFromCache: false,
    ...fields,
  };
}

describe("SellerAdvisoryService", () => {
  describe("evaluate", () => {
    it("flags a rating at the threshold", () => {
      const seller = createSellerRecord({ reviewCount: 12, averageRating: 4.6 });

      expect(service.evaluate(seller, buyable)).toEqual({
        reason: "low_rating",
        message: ADVISORY_MESSAGES.low_rating,
      });
    });

    it("passes a rating just above the threshold", () => {
      const seller = createSellerRecord({ reviewCount: 12, averageRating: 4.7 });

      expect(service.evaluate(seller, buyable)).toEqual({ reason: "none", message: "" });
    });

    it("flags a seller with no reviews before checking the listing", () => {
      const seller = createSellerRecord({ reviewCount: 0, averageRating: 0 });

      expect(service.evaluate(seller, offerOnly).reason).toBe("no_reviews");
    });

    it("flags an offer-only listing from a good seller", () => {
      const seller = createSellerRecord({ reviewCount: 200, averageRating: 4.9 });

      expect(service.evaluate(seller, offerOnly).reason).toBe("no_buy_now_price");
    });

    it("reports a technical issue when the seller could not be read", () => {
      expect(service.evaluate(null, buyable)).toEqual({
        reason: "technical_issue",
        message: ADVISORY_MESSAGES.technical_issue,
      });
    });

    it("prefers the listing check over a missing seller", () => {
      expect(service.evaluate(null, offerOnly).reason).toBe("no_buy_now_price");
    });
  });

  describe("evaluateOutcome", () => {
    it("returns null for failures", () => {
      expect(
        service.evaluateOutcome({
          kind: "listing",
          platform: "unknown",
          sourceUrl: "https://example.org/x",
          elapsedMs: 1,
          success: false,
          error: "Unsupported platform",
          errorKind: "unsupported_platform",
          servedFromCache: false,
        }),
      ).toBeNull();
    });

    it("only checks the listing when no seller is expected", () => {
      expect(service.evaluateOutcome(success({ platform: "ebay" }))?.reason).toBe("none");
      expect(
        service.evaluateOutcome(success({ platform: "ebay", listing: offerOnly }))?.reason,
      ).toBe("no_buy_now_price");
    });

    it("reports a technical issue when a profile was found but not read", () => {
      const outcome = success({ sellerProfileUrl: "https://www.grailed.com/users/x" });

      expect(service.evaluateOutcome(outcome)?.reason).toBe("technical_issue");
    });

    it("evaluates seller lookups without a listing", () => {
      const outcome = success({
        kind: "seller",
        listing: null,
        seller: createSellerRecord({ reviewCount: 3, averageRating: 3.9 }),
      });

      expect(service.evaluateOutcome(outcome)?.reason).toBe("low_rating");
    });
  });
});
