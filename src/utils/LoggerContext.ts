/**
 * Logger context helpers
 *
 * Child loggers carrying service, batch and request identifiers.
 */

import { logger, Logger } from "@/config/logger";
import type { ServiceName } from "@/config/constants";

/**
 * Logger scoped to one internal service (cache, pool, orchestrator...)
 */
export function createServiceLogger(
  serviceName: ServiceName,
  parent: Logger = logger,
): Logger {
  return parent.child({ component: serviceName });
}

/**
 * Logger for one acquireMany batch
 * @param batchId - generated per call
 * @param callerId - identity of the requesting user
 */
export function createBatchLogger(
  parent: Logger,
  batchId: string,
  callerId: string,
): Logger {
  return parent.child({ batch_id: batchId, caller_id: callerId });
}

/**
 * Logger for one HTTP request
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * Milestone line (flagged so dashboards can filter on it)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}

/**
 * Normalised message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
