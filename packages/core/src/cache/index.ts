// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export {
  ResultCache,
  createResultCache,
  deriveKey,
  stableStringify,
  type CacheStats,
  type ResultCacheOptions,
} from "./result-cache.js";
export { MemoryCacheBackend, SqliteCacheBackend, type CacheBackend, type CacheEntry } from "./backends.js";
