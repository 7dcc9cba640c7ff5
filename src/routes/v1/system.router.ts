/**
 * System API Router
 *
 * - GET /system/stats - cache and browser pool snapshot
 * - DELETE /cache?pattern=... - invalidate cache keys by glob
 */

import "@/types/express";
import { NextFunction, Request, Response, Router } from "express";
import { APP_METADATA } from "@/config/constants";
import { logger } from "@/config/logger";
import { CacheInvalidationQuerySchema, respondValidationFailed } from "@/middleware/validation";
import type { AppContext } from "@/services/AppContext";

export function createSystemRouter(ctx: Pick<AppContext, "orchestrator" | "cache">): Router {
  const router = Router();

  /**
   * GET /api/v1/system/stats
   */
  router.get("/system/stats", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await ctx.orchestrator.stats();
      res.json({
        success: true,
        data: { version: APP_METADATA.VERSION, ...stats },
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/v1/cache?pattern=listing:*
   *
   * Pattern is relative to the key prefix
   */
  router.delete("/cache", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CacheInvalidationQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      respondValidationFailed(res, parsed.error);
      return;
    }

    try {
      const deleted = await ctx.cache.invalidate(parsed.data.pattern);
      (req.log ?? logger).warn({ pattern: parsed.data.pattern, deleted }, "Cache invalidated via API");
      res.json({ success: true, deleted });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
