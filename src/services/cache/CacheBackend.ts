/**
 * Key-value backend seam for the cache store
 *
 * RedisCacheBackend adapts ioredis; tests supply an in-memory backend.
 */

import Redis from "ioredis";
import type { Logger } from "@/config/logger";
import { CACHE_CONFIG } from "@/config/constants";

export interface CacheBackend {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(keys: string[]): Promise<number>;
  /** Keys matching a glob pattern */
  scanKeys(pattern: string): Promise<string[]>;
  /** Raw INFO text */
  info(): Promise<string>;
  isConnected(): boolean;
  quit(): Promise<void>;
}

export interface RedisBackendOptions {
  host: string;
  port: number;
  password?: string;
  db?: number;
  commandTimeoutMs?: number;
}

export class RedisCacheBackend implements CacheBackend {
  private readonly client: Redis;

  constructor(
    private readonly logger: Logger,
    options: RedisBackendOptions,
    client?: Redis,
  ) {
    if (client) {
      this.client = client;
      return;
    }

    const { host, port } = options;
    this.client = new Redis({
      host,
      port,
      password: options.password,
      db: options.db ?? 0,
      maxRetriesPerRequest: 1,
      commandTimeout: options.commandTimeoutMs,
      enableOfflineQueue: false,
      retryStrategy: (times: number) => Math.min(times * 50, 2000),
      lazyConnect: false,
    });

    this.client.on("connect", () => {
      logger.info({ host, port }, "Redis connected");
    });
    this.client.on("ready", () => {
      logger.info({ host, port }, "Redis ready");
    });
    this.client.on("error", (err: Error) => {
      logger.error({ error: err.message, host, port }, "Redis connection error");
    });
    this.client.on("close", () => {
      logger.warn({ host, port }, "Redis connection closed");
    });
    this.client.on("reconnecting", () => {
      logger.warn({ host, port }, "Redis reconnecting");
    });
  }

  static fromConfig(logger: Logger): RedisCacheBackend {
    return new RedisCacheBackend(logger, {
      host: CACHE_CONFIG.REDIS_HOST,
      port: CACHE_CONFIG.REDIS_PORT,
      password: CACHE_CONFIG.REDIS_PASSWORD,
      db: CACHE_CONFIG.REDIS_DB,
      commandTimeoutMs: CACHE_CONFIG.COMMAND_TIMEOUT_MS,
    });
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  setex(key: string, seconds: number, value: string): Promise<unknown> {
    return this.client.setex(key, seconds, value);
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.client.del(...keys);
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = "0";
    do {
      const [next, batch] = await this.client.scan(
        cursor,
        "MATCH",
        pattern,
        "COUNT",
        CACHE_CONFIG.SCAN_COUNT,
      );
      keys.push(...batch);
      cursor = next;
    } while (cursor !== "0");
    return keys;
  }

  info(): Promise<string> {
    return this.client.info();
  }

  isConnected(): boolean {
    return this.client.status === "ready";
  }

  async quit(): Promise<void> {
    await this.client.quit();
  }
}
