/**
 * Request logger middleware
 *
 * - assigns a request id and a request-scoped logger
 * - logs arrival and completion with duration
 * - health checks stay out of the log files (console only)
 */

import "@/types/express";
import { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";

const SKIP_FILE_LOG_PATHS = ["/health"];

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = uuidv4();
  const startTime = Date.now();
  const skipFileLog = SKIP_FILE_LOG_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.log = logger;
  req.id = requestId;

  logger.info(
    { query: req.query, ip: req.ip, skip_file_log: skipFileLog },
    "Request received",
  );

  res.on("finish", () => {
    const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";
    logger[level](
      {
        status: res.statusCode,
        duration_ms: Date.now() - startTime,
        skip_file_log: skipFileLog,
      },
      "Request completed",
    );
  });

  next();
}
