/**
 * Acquisition outcome
 *
 * One outcome per requested URL. Discriminated on `success`; a failure
 * carries the error text and its taxonomy kind, never partial data.
 */

import { z } from "zod";
import { ListingRecordSchema } from "@/core/domain/ListingRecord";
import { SellerRecordSchema } from "@/core/domain/SellerRecord";
import { PLATFORM_IDS, UNKNOWN_PLATFORM } from "@/core/domain/PlatformId";

export const AcquisitionKindSchema = z.enum(["listing", "seller"]);

export type AcquisitionKind = z.infer<typeof AcquisitionKindSchema>;

export const AcquisitionErrorKindSchema = z.enum([
  "unsupported_platform",
  "network",
  "structural",
  "pool_unavailable",
  "internal",
]);

export type AcquisitionErrorKind = z.infer<typeof AcquisitionErrorKindSchema>;

export const OutcomePlatformSchema = z.enum([
  PLATFORM_IDS.EBAY,
  PLATFORM_IDS.GRAILED,
  UNKNOWN_PLATFORM,
]);

const OutcomeBaseSchema = z.object({
  kind: AcquisitionKindSchema,
  platform: OutcomePlatformSchema,
  sourceUrl: z.string(),
  elapsedMs: z.number().nonnegative(),
});

export const AcquisitionSuccessSchema = OutcomeBaseSchema.extend({
  success: z.literal(true),
  listing: ListingRecordSchema.nullable(),
  seller: SellerRecordSchema.nullable(),
  /** Profile URL the seller record was read from, when one was found */
  sellerProfileUrl: z.string().nullable(),
  servedFromCache: z.boolean(),
});

export const AcquisitionFailureSchema = OutcomeBaseSchema.extend({
  success: z.literal(false),
  error: z.string(),
  errorKind: AcquisitionErrorKindSchema,
  servedFromCache: z.literal(false),
});

export const AcquisitionOutcomeSchema = z.discriminatedUnion("success", [
  AcquisitionSuccessSchema,
  AcquisitionFailureSchema,
]);

export type AcquisitionSuccess = z.infer<typeof AcquisitionSuccessSchema>;
export type AcquisitionFailure = z.infer<typeof AcquisitionFailureSchema>;
export type AcquisitionOutcome = z.infer<typeof AcquisitionOutcomeSchema>;

/**
 * Whether an outcome may be written to the cache
 *
 * Listings need a price; seller lookups need a seller record.
 * Failures are never cached.
 */
export function isCacheableOutcome(
  outcome: AcquisitionOutcome,
): outcome is AcquisitionSuccess {
  if (!outcome.success) return false;
  if (outcome.kind === "listing") {
    return outcome.listing !== null && outcome.listing.price !== null;
  }
  return outcome.seller !== null;
}
