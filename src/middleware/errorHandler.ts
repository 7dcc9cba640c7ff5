/**
 * Error handler middleware
 *
 * SOLID:
 * - SRP: turns anything thrown by a route into a JSON error response
 */

import "@/types/express";
import { NextFunction, Request, Response } from "express";
import { logger } from "@/config/logger";
import { AcquisitionAbortedError } from "@/core/errors/AcquisitionErrors";

/**
 * Global error handler
 *
 * Express recognises error middleware by arity, hence the unused `_next`.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  (req.log ?? logger).error(
    {
      error: { message: err.message, stack: err.stack, name: err.name },
      request_id: req.id,
      method: req.method,
      path: req.path,
    },
    "Unhandled error",
  );

  if (err instanceof AcquisitionAbortedError) {
    res.status(503).json({ error: "Service unavailable", message: err.message });
    return;
  }

  res.status(500).json({
    error: "Internal server error",
    message: err.message,
    ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn(
    { request_id: req.id, method: req.method, path: req.path },
    "Route not found",
  );

  res.status(404).json({ error: "Not found", path: req.path });
}
