/**
 * Request validation
 *
 * SOLID:
 * - SRP: request shape checks only
 *
 * Bodies are checked by middleware and replaced with their parsed form;
 * params and query are parsed in the route with the schemas below.
 */

import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { SCRAPER_CONFIG, SERVER_CONFIG } from "@/config/constants";
import { CallerIdentitySchema } from "@/core/domain/CallerIdentity";
import { CurrencyCodeSchema } from "@/core/domain/ExchangeRate";
import { validateMarketplaceUrl } from "@/scrapers/common/UrlValidator";

export const AcquisitionRequestSchema = CallerIdentitySchema.extend({
  urls: z
    .array(z.string())
    .min(1, "urls must contain at least one URL")
    .max(
      SERVER_CONFIG.MAX_URLS_PER_REQUEST,
      `urls may contain at most ${SERVER_CONFIG.MAX_URLS_PER_REQUEST} URLs`,
    ),
});

export type AcquisitionRequest = z.output<typeof AcquisitionRequestSchema>;

export const RatePairParamsSchema = z.object({
  from: CurrencyCodeSchema,
  to: CurrencyCodeSchema,
});

export const CacheInvalidationQuerySchema = z.object({
  pattern: z
    .string({ required_error: "pattern is required" })
    .trim()
    .min(1, "pattern is required")
    .regex(/^[\w:*?-]+$/, "pattern may only contain word characters, ':', '-', '*' and '?'"),
});

/**
 * 400 response listing every issue as "path: message"
 */
export function respondValidationFailed(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: "Validation failed",
    details: error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    ),
  });
}

/**
 * Acquisition body: schema, then the marketplace allow-list for each URL.
 * On success req.body holds the parsed request with trimmed URLs.
 */
export function validateAcquisitionRequest(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const parsed = AcquisitionRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    respondValidationFailed(res, parsed.error);
    return;
  }

  const checks = parsed.data.urls.map((url) =>
    validateMarketplaceUrl(url, SCRAPER_CONFIG.ALLOWED_DOMAINS),
  );
  const details = checks.flatMap((check, index) =>
    check.valid ? [] : [`urls.${index}: ${check.reason}`],
  );
  if (details.length > 0) {
    res.status(400).json({ error: "Validation failed", details });
    return;
  }

  const request: AcquisitionRequest = {
    ...parsed.data,
    urls: checks.map((check) => check.url),
  };
  req.body = request;
  next();
}
