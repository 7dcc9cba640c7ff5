/**
 * Seller advisory
 *
 * Warning attached to an analysed listing or seller. `none` means every
 * check passed and `message` is empty.
 */

import { z } from "zod";

export const AdvisoryReasonSchema = z.enum([
  "low_rating",
  "no_reviews",
  "no_buy_now_price",
  "technical_issue",
  "none",
]);

export type AdvisoryReason = z.infer<typeof AdvisoryReasonSchema>;

export const SellerAdvisorySchema = z.object({
  reason: AdvisoryReasonSchema,
  message: z.string(),
});

export type SellerAdvisory = z.infer<typeof SellerAdvisorySchema>;
