/**
 * Acquisition error taxonomy
 *
 * Each class maps onto an AcquisitionErrorKind so failures can be tagged
 * on outcomes without string matching.
 */

import type { AcquisitionErrorKind } from "@/core/domain/AcquisitionOutcome";

export abstract class AcquisitionError extends Error {
  abstract readonly kind: AcquisitionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout, refused connection, HTTP 429 or 5xx */
export class TransientNetworkError extends AcquisitionError {
  readonly kind = "network" as const;

  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The page loaded but the expected data was absent (or HTTP 404) */
export class StructuralScrapeError extends AcquisitionError {
  readonly kind = "structural" as const;
}

/** No scraper claims the URL */
export class UnsupportedPlatformError extends AcquisitionError {
  readonly kind = "unsupported_platform" as const;

  constructor(readonly url: string) {
    super(`Unsupported platform: ${url}`);
  }
}

/** Pool is shut down or otherwise unable to lease */
export class PoolUnavailableError extends AcquisitionError {
  readonly kind = "pool_unavailable" as const;
}

/** Browser engines could not be launched */
export class PoolStartupError extends PoolUnavailableError {}

/** A lease was not granted within the configured acquire timeout */
export class PoolTimeoutError extends PoolUnavailableError {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a browser session`);
  }
}

/** acquireMany was called after shutdown */
export class AcquisitionAbortedError extends Error {
  constructor(message = "Acquisition service has been shut down") {
    super(message);
    this.name = "AcquisitionAbortedError";
  }
}

/**
 * Taxonomy kind of any thrown value
 */
export function classifyError(error: unknown): AcquisitionErrorKind {
  return error instanceof AcquisitionError ? error.kind : "internal";
}
