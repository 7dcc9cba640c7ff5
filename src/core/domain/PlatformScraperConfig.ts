/**
 * Platform scraper configuration (loaded from YAML)
 */

import { z } from "zod";
import { PLATFORM_IDS } from "@/core/domain/PlatformId";

export const FieldSelectorSchema = z.object({
  selector: z.string().min(1),
  /** Attribute to read; element text when omitted */
  attr: z.string().min(1).optional(),
});

export type FieldSelector = z.infer<typeof FieldSelectorSchema>;

const SelectorListSchema = z.array(FieldSelectorSchema).default([]);

export const ListingSelectorsSchema = z.object({
  price: SelectorListSchema,
  shipping: SelectorListSchema,
  title: SelectorListSchema,
  image: SelectorListSchema,
  freeShippingPattern: z.string().optional(),
  defaultShipping: z.number().nonnegative().optional(),
});

export const SellerSelectorsSchema = z.object({
  rating: SelectorListSchema,
  reviews: SelectorListSchema,
  trustedBadge: SelectorListSchema,
  trustedTextPattern: z.string().optional(),
  profile: z.object({
    reservedPaths: z.array(z.string()).default([]),
    profilePrefixes: z.array(z.string()).default([]),
  }),
});

export const PlatformScraperConfigSchema = z.object({
  platform: z.enum([PLATFORM_IDS.EBAY, PLATFORM_IDS.GRAILED]),
  name: z.string(),
  baseUrl: z.string().url(),
  domainLabels: z.array(z.string().min(1)).min(1),
  listing: ListingSelectorsSchema,
  seller: SellerSelectorsSchema.optional(),
});

export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;
export type SellerSelectors = z.infer<typeof SellerSelectorsSchema>;
export type PlatformScraperConfig = z.infer<typeof PlatformScraperConfigSchema>;
