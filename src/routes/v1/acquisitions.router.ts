/**
 * Acquisitions API Router
 *
 * - POST / - acquire a batch of marketplace URLs
 */

import "@/types/express";
import { NextFunction, Request, Response, Router } from "express";
import { logger } from "@/config/logger";
import { AcquisitionRequest, validateAcquisitionRequest } from "@/middleware/validation";
import type { AppContext } from "@/services/AppContext";

export function createAcquisitionsRouter(
  ctx: Pick<AppContext, "orchestrator" | "advisory">,
): Router {
  const router = Router();

  /**
   * POST /api/v1/acquisitions
   *
   * Body: { urls: string[], callerId: string | number, username?: string }
   * One outcome (and advisory) per URL, in request order
   */
  router.post(
    "/",
    validateAcquisitionRequest,
    async (req: Request, res: Response, next: NextFunction) => {
      const body: AcquisitionRequest = req.body;
      try {
        const outcomes = await ctx.orchestrator.acquireMany(body.urls, {
          callerId: body.callerId,
          username: body.username,
        });

        res.json({
          success: true,
          outcomes,
          advisories: outcomes.map((outcome) => ctx.advisory.evaluateOutcome(outcome)),
        });
      } catch (error) {
        (req.log ?? logger).error({ error, urlCount: body.urls.length }, "Acquisition batch failed");
        next(error);
      }
    },
  );

  return router;
}
