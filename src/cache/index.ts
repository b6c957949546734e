export type { CacheEntry, CacheStore, CacheTier } from "./types.js";
export { isExpired } from "./types.js";
export { cacheKey, cacheKeyPrefix } from "./cache-key.js";
export { MemoryLru } from "./memory-lru.js";
export { FileCacheStore, MemoryCacheStore, resolveCacheDir } from "./store.js";
export {
  ResultCache,
  type CacheLookup,
  type CacheStats,
  type LoadOptions,
  type LoadResult,
  type ResultCacheOptions,
} from "./result-cache.js";
