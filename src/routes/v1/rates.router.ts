/**
 * Rates API Router
 *
 * - GET /:from/:to - exchange rate for a currency pair
 */

import { NextFunction, Request, Response, Router } from "express";
import { RatePairParamsSchema, respondValidationFailed } from "@/middleware/validation";
import type { AppContext } from "@/services/AppContext";

export function createRatesRouter(ctx: Pick<AppContext, "currency">): Router {
  const router = Router();

  /**
   * GET /api/v1/rates/USD/RUB
   *
   * 404 when no rate (fresh or fallback) is available
   */
  router.get("/:from/:to", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = RatePairParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      respondValidationFailed(res, parsed.error);
      return;
    }

    try {
      const rate = await ctx.currency.getRate(parsed.data.from, parsed.data.to);
      if (!rate) {
        res.status(404).json({
          error: "Rate unavailable",
          message: `No rate available for ${parsed.data.from}/${parsed.data.to}`,
        });
        return;
      }
      res.json({ success: true, data: rate });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
