/**
 * In-process stand-in for Redis
 *
 * Honours SETEX expiry against an injectable clock and supports the glob
 * subset SCAN MATCH uses ("*" and "?").
 */

import type { CacheBackend } from "@/services/cache/CacheBackend";

interface StoredValue {
  value: string;
  expiresAt: number;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split("")
    .map((char) => {
      if (char === "*") return ".*";
      if (char === "?") return ".";
      return char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${escaped}$`);
}

export class InMemoryCacheBackend implements CacheBackend {
  readonly store = new Map<string, StoredValue>();
  /** When set, every command rejects with this error */
  failWith: Error | null = null;
  connected = true;
  setexCalls: Array<{ key: string; seconds: number }> = [];

  constructor(public now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    this.guard();
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return entry.value;
  }

  async setex(key: string, seconds: number, value: string): Promise<unknown> {
    this.guard();
    this.setexCalls.push({ key, seconds });
    this.store.set(key, { value, expiresAt: this.now() + seconds * 1000 });
    return "OK";
  }

  async del(keys: string[]): Promise<number> {
    this.guard();
    let deleted = 0;
    for (const key of keys) {
      if (this.store.delete(key)) deleted++;
    }
    return deleted;
  }

  async scanKeys(pattern: string): Promise<string[]> {
    this.guard();
    const matcher = globToRegExp(pattern);
    return [...this.store.keys()].filter((key) => matcher.test(key));
  }

  async info(): Promise<string> {
    this.guard();
    return [
      "# Memory",
      "used_memory_human:1.25M",
      "# Stats",
      "keyspace_hits:30",
      "keyspace_misses:10",
    ].join("\r\n");
  }

  isConnected(): boolean {
    return this.connected;
  }

  async quit(): Promise<void> {
    this.connected = false;
  }

  private guard(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}
