/**
 * Seller trust evaluation contract
 */

import type { AcquisitionOutcome } from "@/core/domain/AcquisitionOutcome";
import type { ListingRecord } from "@/core/domain/ListingRecord";
import type { SellerAdvisory } from "@/core/domain/SellerAdvisory";
import type { SellerRecord } from "@/core/domain/SellerRecord";

export interface ISellerTrustEvaluator {
  /**
   * @param seller - null when seller data could not be obtained
   * @param listing - present when a listing page was analysed
   */
  evaluate(seller: SellerRecord | null, listing?: ListingRecord | null): SellerAdvisory;
  /** null for failed outcomes */
  evaluateOutcome(outcome: AcquisitionOutcome): SellerAdvisory | null;
}
