/**
 * Express Request augmentation
 *
 * - id: request id (uuid v4), set by requestLogger
 * - log: request-scoped logger
 */

import type { Logger } from "pino";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      id?: string;
      log?: Logger;
    }
  }
}

export {};
