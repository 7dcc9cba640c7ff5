/**
 * Listing record
 *
 * Pricing facts extracted from one marketplace listing page.
 * A null price means extraction failed; it never stands for zero.
 * `buyable = false` with a price is a valid offer-only listing.
 */

import { z } from "zod";

export const ListingRecordSchema = z.object({
  price: z.number().nonnegative().nullable(),
  shippingCostOrigin: z.number().nonnegative().nullable(),
  buyable: z.boolean(),
  title: z.string().nullable(),
  imageRef: z.string().nullable(),
});

export type ListingRecord = z.infer<typeof ListingRecordSchema>;

export function createListingRecord(
  fields: Partial<ListingRecord> = {},
): ListingRecord {
  return {
    price: fields.price ?? null,
    shippingCostOrigin: fields.shippingCostOrigin ?? null,
    buyable: fields.buyable ?? false,
    title: fields.title ?? null,
    imageRef: fields.imageRef ?? null,
  };
}

export function hasPrice(
  listing: ListingRecord | null,
): listing is ListingRecord & { price: number } {
  return listing !== null && listing.price !== null;
}
