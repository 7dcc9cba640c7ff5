/**
 * API v1 main router
 *
 * SOLID:
 * - SRP: assembles the v1 routers only
 */

import { Router } from "express";
import type { AppContext } from "@/services/AppContext";
import { createAcquisitionsRouter } from "./acquisitions.router";
import { createRatesRouter } from "./rates.router";
import { createSystemRouter } from "./system.router";

export function createV1Router(ctx: AppContext): Router {
  const router = Router();

  router.use("/acquisitions", createAcquisitionsRouter(ctx));
  router.use("/rates", createRatesRouter(ctx));
  router.use("/", createSystemRouter(ctx));

  return router;
}
