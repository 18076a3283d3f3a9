// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ResultCache — TTL cache for repeated external lookups (searches, doc fetches).
 *
 * Key: first 16 hex chars of sha256(`${queryType}:${stableStringify(params)}`).
 * Expiry is lazy: get() evicts what it finds stale; clearExpired() sweeps on request.
 */

import { createHash } from "crypto";

import { logger as sharedLogger, type Logger } from "../logger.js";
import type { TandemConfig } from "../types.js";
import { MemoryCacheBackend, SqliteCacheBackend, type CacheBackend, type CacheEntry } from "./backends.js";

const HOUR_MS = 60 * 60 * 1000;

export interface ResultCacheOptions {
  backend?: CacheBackend;
  ttlHours?: number;
  /** Epoch ms. Injected for tests. */
  now?: () => number;
  logger?: Logger;
}

export interface CacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  byType: Record<string, number>;
  sizeBytes: number;
  hits: number;
  misses: number;
  ttlHours: number;
}

function byJson(a: unknown, b: unknown): number {
  const x = JSON.stringify(a) ?? "";
  const y = JSON.stringify(b) ?? "";
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Plain, order-independent form of `value`. Maps and Sets become tagged sorted lists;
 * anything with toJSON (Date, URL, Buffer) is reduced through it.
 */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value instanceof Map) {
    return { __map: [...value.entries()].map(([k, v]) => [sortKeys(k), sortKeys(v)]).sort(byJson) };
  }
  if (value instanceof Set) return { __set: [...value].map(sortKeys).sort(byJson) };
  if (value !== null && typeof value === "object") {
    if ("toJSON" in value && typeof value.toJSON === "function") {
      const plain: unknown = JSON.parse(JSON.stringify(value) ?? "null");
      return sortKeys(plain);
    }
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, sortKeys(v)]),
    );
  }
  return value;
}

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? "null";
}

export function deriveKey(queryType: string, params: unknown): string {
  return createHash("sha256")
    .update(`${queryType}:${stableStringify(params)}`)
    .digest("hex")
    .slice(0, 16);
}

export class ResultCache {
  readonly ttlHours: number;
  private readonly backend: CacheBackend;
  private readonly now: () => number;
  private readonly log: Logger;
  private hits = 0;
  private misses = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.backend = options.backend ?? new MemoryCacheBackend();
    this.ttlHours = options.ttlHours ?? 24;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? sharedLogger).child({ component: "cache" });
  }

  private get ttlMs(): number {
    return this.ttlHours * HOUR_MS;
  }

  private isExpired(entry: CacheEntry, now = this.now()): boolean {
    return now - entry.createdAt > this.ttlMs;
  }

  /** Cached value, or undefined when absent or stale. */
  get(queryType: string, params: unknown): unknown {
    const key = deriveKey(queryType, params);
    const entry = this.backend.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.backend.delete(key);
      this.misses++;
      this.log.debug({ key, queryType }, "evicted stale cache entry");
      return undefined;
    }
    this.hits++;
    return JSON.parse(entry.value);
  }

  /** `value` must be JSON-serialisable. */
  set(queryType: string, params: unknown, value: unknown): string {
    const key = deriveKey(queryType, params);
    this.backend.set({ key, queryType, value: stableStringify(value), createdAt: this.now() });
    return key;
  }

  clearExpired(): number {
    const removed = this.backend.deleteCreatedBefore(this.now() - this.ttlMs);
    if (removed > 0) this.log.info({ removed }, "cleared expired cache entries");
    return removed;
  }

  clear(): number {
    this.hits = 0;
    this.misses = 0;
    return this.backend.clear();
  }

  getStats(): CacheStats {
    const now = this.now();
    const entries = this.backend.entries();
    const byType: Record<string, number> = {};
    let expired = 0;
    let sizeBytes = 0;
    for (const entry of entries) {
      byType[entry.queryType] = (byType[entry.queryType] ?? 0) + 1;
      sizeBytes += Buffer.byteLength(entry.value, "utf8");
      if (this.isExpired(entry, now)) expired++;
    }
    return {
      totalEntries: entries.length,
      activeEntries: entries.length - expired,
      expiredEntries: expired,
      byType,
      sizeBytes,
      hits: this.hits,
      misses: this.misses,
      ttlHours: this.ttlHours,
    };
  }

  close(): void {
    this.backend.close();
  }
}

/** Cache wired from the `cache` config section. */
export function createResultCache(config: TandemConfig["cache"], logger?: Logger): ResultCache {
  const backend = config.backend === "sqlite" ? new SqliteCacheBackend(config.path) : new MemoryCacheBackend();
  return new ResultCache({ backend, ttlHours: config.ttlHours, ...(logger && { logger }) });
}
