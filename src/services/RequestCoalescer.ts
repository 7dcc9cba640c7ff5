/**
 * Request coalescer
 *
 * Identical in-flight fetches share one promise. The entry is dropped as
 * soon as the fetch settles, so the next caller starts fresh. A rejection
 * reaches every waiter; nothing is retried here.
 *
 * Check-and-register is synchronous, which makes it atomic on the event loop.
 */

import { SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import { createServiceLogger } from "@/utils/LoggerContext";

export class RequestCoalescer<T> {
  private readonly inFlight = new Map<string, Promise<T>>();
  private readonly logger: Logger;

  constructor(parentLogger?: Logger) {
    this.logger = createServiceLogger(SERVICE_NAMES.COALESCER, parentLogger);
  }

  getOrFetch(key: string, fetchFn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.logger.debug({ key }, "Joined in-flight request");
      return existing;
    }

    // async wrapper turns a synchronous throw into a rejection
    const started = (async () => fetchFn())();
    const tracked: Promise<T> = started.finally(() => {
      if (this.inFlight.get(key) === tracked) {
        this.inFlight.delete(key);
      }
    });
    this.inFlight.set(key, tracked);
    return tracked;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }
}
