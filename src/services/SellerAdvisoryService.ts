/**
 * Seller advisory service
 *
 * Rules, first match wins:
 * 1. reviews > 0 and rating <= threshold -> low_rating
 * 2. seller with zero reviews            -> no_reviews
 * 3. listing without a Buy Now price     -> no_buy_now_price
 * 4. no seller record at all             -> technical_issue
 * 5. otherwise                           -> none
 */

import { ADVISORY_CONFIG } from "@/config/constants";
import type { AcquisitionOutcome } from "@/core/domain/AcquisitionOutcome";
import type { ListingRecord } from "@/core/domain/ListingRecord";
import type { AdvisoryReason, SellerAdvisory } from "@/core/domain/SellerAdvisory";
import type { SellerRecord } from "@/core/domain/SellerRecord";
import type { ISellerTrustEvaluator } from "@/core/interfaces/ISellerTrustEvaluator";

export const ADVISORY_MESSAGES: Record<AdvisoryReason, string> = {
  low_rating:
    "The seller has a low rating, which usually means a lot of negative reviews. Consider another offer.",
  no_reviews:
    "The seller has no reviews yet. Buying from them carries extra risk.",
  no_buy_now_price:
    "This listing has no Buy Now price. We recommend skipping it.",
  technical_issue:
    "Seller data could not be analysed due to a technical issue. Please try again later.",
  none: "",
};

export class SellerAdvisoryService implements ISellerTrustEvaluator {
  constructor(
    private readonly lowRatingThreshold: number = ADVISORY_CONFIG.LOW_RATING_THRESHOLD,
  ) {}

  evaluate(seller: SellerRecord | null, listing: ListingRecord | null = null): SellerAdvisory {
    if (seller) {
      if (seller.reviewCount > 0 && seller.averageRating <= this.lowRatingThreshold) {
        return this.advise("low_rating");
      }
      if (seller.reviewCount === 0) {
        return this.advise("no_reviews");
      }
    }

    if (listing && !listing.buyable) {
      return this.advise("no_buy_now_price");
    }

    if (!seller) {
      return this.advise("technical_issue");
    }

    return this.advise("none");
  }

  /**
   * Listings from platforms without seller pages (no profile URL, no
   * seller) only get the listing check
   */
  evaluateOutcome(outcome: AcquisitionOutcome): SellerAdvisory | null {
    if (!outcome.success) return null;

    const sellerExpected =
      outcome.kind === "seller" || outcome.sellerProfileUrl !== null || outcome.seller !== null;
    if (!sellerExpected) {
      return outcome.listing && !outcome.listing.buyable
        ? this.advise("no_buy_now_price")
        : this.advise("none");
    }
    return this.evaluate(outcome.seller, outcome.listing);
  }

  private advise(reason: AdvisoryReason): SellerAdvisory {
    return { reason, message: ADVISORY_MESSAGES[reason] };
  }
}
