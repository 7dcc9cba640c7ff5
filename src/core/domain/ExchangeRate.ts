/**
 * Exchange rate
 */

import { z } from "zod";

export const CurrencyCodeSchema = z
  .string()
  .regex(/^[A-Za-z]{3}$/)
  .transform((code) => code.toUpperCase());

export const RateSourceSchema = z.enum(["cbr", "cache", "fallback"]);

export type RateSource = z.infer<typeof RateSourceSchema>;

export const ExchangeRateSchema = z.object({
  from: z.string().length(3),
  to: z.string().length(3),
  rate: z.number().positive(),
  source: RateSourceSchema,
  fetchedAt: z.coerce.date(),
  markupPercentage: z.number().nonnegative(),
});

export type ExchangeRate = z.infer<typeof ExchangeRateSchema>;

/** Cache identifier of a currency pair, e.g. "USD_RUB" */
export function ratePairKey(from: string, to: string): string {
  return `${from.toUpperCase()}_${to.toUpperCase()}`;
}
