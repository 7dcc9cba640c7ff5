/**
 * Analytics sink contract
 *
 * Receives every acquisition outcome exactly once, with the caller that
 * asked for it. Implementations may throw; the orchestrator logs and
 * carries on.
 */

import type { AcquisitionOutcome } from "@/core/domain/AcquisitionOutcome";
import type { CallerIdentity } from "@/core/domain/CallerIdentity";

export interface IAnalyticsSink {
  record(outcome: AcquisitionOutcome, caller: CallerIdentity): Promise<void>;
}
