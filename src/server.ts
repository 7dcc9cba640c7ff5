/**
 * Listing Scanner server
 * API v1 over the acquisition orchestrator
 */

import "dotenv/config";
import { APP_METADATA, SERVER_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { createApp } from "@/app";
import { createAppContext } from "@/services/AppContext";
import { createServiceLogger, errorMessage, logImportant } from "@/utils/LoggerContext";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

const ctx = createAppContext();
const app = createApp(ctx);
const BASE_URL = process.env.BASE_URL || `http://localhost:${SERVER_CONFIG.PORT}`;

const server = app.listen(SERVER_CONFIG.PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} server started`, {
    port: SERVER_CONFIG.PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
  });

  logger.info(
    {
      baseUrl: BASE_URL,
      endpoints: {
        health: `${BASE_URL}/health`,
        acquisitions: "POST /api/v1/acquisitions",
        stats: "GET /api/v1/system/stats",
        cache: "DELETE /api/v1/cache?pattern=",
        rates: "GET /api/v1/rates/:from/:to",
      },
    },
    "API v1 endpoints registered",
  );
});

// Pre-warm in the background; acquire retries initialisation on demand
ctx.pool.initialize().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, "Browser pool pre-warm failed");
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.warn({ signal }, "Shutdown signal received");

  const forceExit = setTimeout(() => {
    logger.error({ timeoutMs: SERVER_CONFIG.SHUTDOWN_TIMEOUT_MS }, "Forced exit after shutdown timeout");
    process.exit(1);
  }, SERVER_CONFIG.SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server.close(() => {
    logger.info("HTTP server closed");
    ctx
      .shutdown()
      .then(() => {
        logImportant(logger, "Server shutdown complete");
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Service shutdown failed");
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
