/**
 * Analytics sink writing one structured log line per outcome
 *
 * Lines carry `analytics: true` so log shippers can route them apart
 * from operational logs.
 */

import { SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import type { AcquisitionOutcome } from "@/core/domain/AcquisitionOutcome";
import type { CallerIdentity } from "@/core/domain/CallerIdentity";
import type { IAnalyticsSink } from "@/core/interfaces/IAnalyticsSink";
import { createServiceLogger } from "@/utils/LoggerContext";

export class LoggerAnalyticsSink implements IAnalyticsSink {
  private readonly logger: Logger;

  constructor(parentLogger?: Logger) {
    this.logger = createServiceLogger(SERVICE_NAMES.ANALYTICS, parentLogger);
  }

  async record(outcome: AcquisitionOutcome, caller: CallerIdentity): Promise<void> {
    const base = {
      analytics: true,
      caller_id: caller.callerId,
      username: caller.username ?? null,
      url: outcome.sourceUrl,
      platform: outcome.platform,
      kind: outcome.kind,
      success: outcome.success,
      processing_time_ms: outcome.elapsedMs,
    };

    if (!outcome.success) {
      this.logger.info(
        { ...base, error_kind: outcome.errorKind, error: outcome.error },
        "Acquisition recorded",
      );
      return;
    }

    this.logger.info(
      {
        ...base,
        served_from_cache: outcome.servedFromCache,
        item_title: outcome.listing?.title ?? null,
        item_price: outcome.listing?.price ?? null,
        shipping_cost: outcome.listing?.shippingCostOrigin ?? null,
        seller_rating: outcome.seller?.averageRating ?? null,
        seller_reviews: outcome.seller?.reviewCount ?? null,
      },
      "Acquisition recorded",
    );
  }
}
