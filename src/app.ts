/**
 * Express application
 *
 * Built from an AppContext so the server and the tests share one wiring.
 */

import express, { Express, Request, Response } from "express";
import { APP_METADATA } from "@/config/constants";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { createV1Router } from "@/routes/v1";
import type { AppContext } from "@/services/AppContext";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", async (_req: Request, res: Response) => {
    const cache = await ctx.cache.stats();
    const pool = ctx.pool.stats();
    const degraded = cache.enabled && !cache.connected;

    res.status(200).json({
      status: degraded ? "degraded" : "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
      architecture: APP_METADATA.ARCHITECTURE,
      platforms: ctx.registry.platforms(),
      cache: { enabled: cache.enabled, connected: cache.connected },
      pool: { initialized: pool.initialized, inUse: pool.inUse, available: pool.available },
    });
  });

  app.use("/api/v1", createV1Router(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
