/**
 * Cache store contract
 *
 * Namespaces are typed: each one maps to the record shape it holds.
 */

import type { AcquisitionSuccess } from "@/core/domain/AcquisitionOutcome";
import type { ExchangeRate } from "@/core/domain/ExchangeRate";

export interface CacheRecordMap {
  listing: AcquisitionSuccess;
  seller: AcquisitionSuccess;
  rate: ExchangeRate;
}

export type CacheNamespace = keyof CacheRecordMap;

export const CACHE_NAMESPACES: readonly CacheNamespace[] = [
  "listing",
  "seller",
  "rate",
];

export interface CacheStats {
  enabled: boolean;
  connected: boolean;
  /** Reads served by this process */
  hits: number;
  misses: number;
  /** Server-wide figures from INFO, when available */
  usedMemory: string | null;
  keyspaceHits: number | null;
  keyspaceMisses: number | null;
  /** keyspace hit percentage, two decimals */
  hitRate: number | null;
}

export interface ICacheStore {
  get<N extends CacheNamespace>(
    namespace: N,
    identifier: string,
  ): Promise<CacheRecordMap[N] | null>;
  set<N extends CacheNamespace>(
    namespace: N,
    identifier: string,
    record: CacheRecordMap[N],
    ttlOverrideSeconds?: number,
  ): Promise<boolean>;
  /** Glob relative to the key prefix, e.g. "rate:*"; returns keys deleted */
  invalidate(pattern: string): Promise<number>;
  invalidateNamespace(namespace: CacheNamespace): Promise<number>;
  stats(): Promise<CacheStats>;
  close(): Promise<void>;
}
