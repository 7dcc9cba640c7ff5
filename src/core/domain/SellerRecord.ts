/**
 * Seller record
 *
 * Trust signals from a seller profile. A missing record (null) means the
 * profile could not be read, which is not the same as zero reviews.
 */

import { z } from "zod";

/** Accepts a Date or its JSON string form; null stays null */
const NullableDateSchema = z.union([z.null(), z.coerce.date()]);

export const SellerRecordSchema = z.object({
  reviewCount: z.number().int().nonnegative(),
  averageRating: z.number().min(0).max(5),
  trustedBadge: z.boolean(),
  lastActivityAt: NullableDateSchema,
});

export type SellerRecord = z.infer<typeof SellerRecordSchema>;

export function createSellerRecord(
  fields: Partial<SellerRecord> = {},
): SellerRecord {
  return {
    reviewCount: Math.max(0, Math.trunc(fields.reviewCount ?? 0)),
    averageRating: Math.min(5, Math.max(0, fields.averageRating ?? 0)),
    trustedBadge: fields.trustedBadge ?? false,
    lastActivityAt: fields.lastActivityAt ?? null,
  };
}
