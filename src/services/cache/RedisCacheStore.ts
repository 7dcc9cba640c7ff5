/**
 * Redis cache store
 *
 * SOLID:
 * - SRP: keying, TTLs and (de)serialisation of cached records
 * - DIP: talks to a CacheBackend, not to ioredis directly
 *
 * Keys: "<prefix>:<namespace>:<md5(lower(trim(identifier)))>"
 *
 * No operation throws. An unreachable or failing backend reads as a miss,
 * and writes and invalidations report false / 0.
 */

import { createHash } from "crypto";
import { CACHE_CONFIG, SERVICE_NAMES } from "@/config/constants";
import type { Logger } from "@/config/logger";
import type {
  CacheNamespace,
  CacheRecordMap,
  CacheStats,
  ICacheStore,
} from "@/core/interfaces/ICacheStore";
import type { CacheBackend } from "@/services/cache/CacheBackend";
import {
  decodeEntry,
  encodeEntry,
} from "@/services/cache/CachePayloadCodec";
import { createServiceLogger, errorMessage } from "@/utils/LoggerContext";

export interface CacheStoreOptions {
  enabled?: boolean;
  keyPrefix?: string;
  ttlSeconds?: Partial<Record<CacheNamespace, number>>;
  /** Clock used for the freshness check */
  now?: () => number;
}

/**
 * Redis key for an identifier
 */
export function buildCacheKey(
  prefix: string,
  namespace: CacheNamespace,
  identifier: string,
): string {
  const digest = createHash("md5")
    .update(identifier.trim().toLowerCase())
    .digest("hex");
  return `${prefix}:${namespace}:${digest}`;
}

function parseInfoNumber(info: string, field: string): number | null {
  const match = info.match(new RegExp(`^${field}:(\\d+)`, "m"));
  return match ? Number(match[1]) : null;
}

function parseInfoString(info: string, field: string): string | null {
  const match = info.match(new RegExp(`^${field}:(\\S+)`, "m"));
  return match?.[1] ?? null;
}

export class RedisCacheStore implements ICacheStore {
  private readonly logger: Logger;
  private readonly enabled: boolean;
  private readonly keyPrefix: string;
  private readonly ttlSeconds: Record<CacheNamespace, number>;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly backend: CacheBackend | null,
    options: CacheStoreOptions = {},
    parentLogger?: Logger,
  ) {
    this.logger = createServiceLogger(SERVICE_NAMES.CACHE, parentLogger);
    this.enabled = (options.enabled ?? CACHE_CONFIG.ENABLED) && backend !== null;
    this.keyPrefix = options.keyPrefix ?? CACHE_CONFIG.KEY_PREFIX;
    this.ttlSeconds = { ...CACHE_CONFIG.TTL_SECONDS, ...options.ttlSeconds };
    this.now = options.now ?? Date.now;
  }

  async get<N extends CacheNamespace>(
    namespace: N,
    identifier: string,
  ): Promise<CacheRecordMap[N] | null> {
    if (!this.enabled || !this.backend) return null;
    const key = buildCacheKey(this.keyPrefix, namespace, identifier);

    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (error) {
      this.logger.warn({ namespace, error: errorMessage(error) }, "Cache read failed");
      this.misses++;
      return null;
    }

    if (raw === null) {
      this.misses++;
      return null;
    }

    const decoded = decodeEntry(namespace, raw);
    if (!decoded.ok) {
      this.logger.warn({ namespace, key, reason: decoded.reason }, "Cache entry discarded");
      this.misses++;
      return null;
    }

    const { entry } = decoded;
    if (this.now() - entry.writtenAt >= entry.ttlSeconds * 1000) {
      this.misses++;
      return null;
    }

    if (!this.isServable(namespace, entry.record)) {
      this.logger.debug({ namespace, key }, "Cached outcome lacks required data; treating as miss");
      this.misses++;
      return null;
    }

    this.hits++;
    this.logger.debug({ namespace, key }, "Cache hit");
    return entry.record;
  }

  async set<N extends CacheNamespace>(
    namespace: N,
    identifier: string,
    record: CacheRecordMap[N],
    ttlOverrideSeconds?: number,
  ): Promise<boolean> {
    if (!this.enabled || !this.backend) return false;
    const key = buildCacheKey(this.keyPrefix, namespace, identifier);
    const ttlSeconds = Math.max(1, Math.floor(ttlOverrideSeconds ?? this.ttlSeconds[namespace]));

    try {
      await this.backend.setex(
        key,
        ttlSeconds,
        encodeEntry({ namespace, writtenAt: this.now(), ttlSeconds, record }),
      );
      this.logger.debug({ namespace, key, ttlSeconds }, "Cache write");
      return true;
    } catch (error) {
      this.logger.warn({ namespace, error: errorMessage(error) }, "Cache write failed");
      return false;
    }
  }

  async invalidate(pattern: string): Promise<number> {
    if (!this.enabled || !this.backend) return 0;
    try {
      const keys = await this.backend.scanKeys(`${this.keyPrefix}:${pattern}`);
      const deleted = await this.backend.del(keys);
      this.logger.info({ pattern, deleted }, "Cache invalidated");
      return deleted;
    } catch (error) {
      this.logger.warn({ pattern, error: errorMessage(error) }, "Cache invalidation failed");
      return 0;
    }
  }

  invalidateNamespace(namespace: CacheNamespace): Promise<number> {
    return this.invalidate(`${namespace}:*`);
  }

  async stats(): Promise<CacheStats> {
    const base: CacheStats = {
      enabled: this.enabled,
      connected: false,
      hits: this.hits,
      misses: this.misses,
      usedMemory: null,
      keyspaceHits: null,
      keyspaceMisses: null,
      hitRate: null,
    };
    if (!this.enabled || !this.backend) return base;

    try {
      const info = await this.backend.info();
      const keyspaceHits = parseInfoNumber(info, "keyspace_hits");
      const keyspaceMisses = parseInfoNumber(info, "keyspace_misses");
      const total = (keyspaceHits ?? 0) + (keyspaceMisses ?? 0);
      return {
        ...base,
        connected: this.backend.isConnected(),
        usedMemory: parseInfoString(info, "used_memory_human"),
        keyspaceHits,
        keyspaceMisses,
        hitRate:
          total > 0 ? Math.round(((keyspaceHits ?? 0) / total) * 10000) / 100 : null,
      };
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "Cache stats unavailable");
      return base;
    }
  }

  async close(): Promise<void> {
    if (!this.backend) return;
    try {
      await this.backend.quit();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "Cache backend close failed");
    }
  }

  /**
   * Successful listings must carry a price and seller lookups a seller;
   * anything else left over from an older writer is not served.
   */
  private isServable(
    namespace: CacheNamespace,
    record: CacheRecordMap[CacheNamespace],
  ): boolean {
    if (!("success" in record)) return true;
    if (namespace === "listing") {
      return record.listing !== null && record.listing.price !== null;
    }
    return record.seller !== null;
  }
}
