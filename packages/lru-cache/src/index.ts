export {
  capacitySchema,
  DEFAULT_CAPACITY,
  lruCacheOptionsSchema,
  parseLruCacheOptions,
} from "./core/config/lru-cache-options"
export {
  EvictionStalledError,
  type EvictionStalledErrorCode,
  InvalidArgumentError,
  type InvalidArgumentErrorCode,
} from "./core/errors/lru-cache.errors"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { createLruCache, LruCache } from "./core/lru-cache"
export type { BoundedCache } from "./ports/bounded-cache"
export type { CacheEntry } from "./ports/cache-entry"
export type { LruCacheDeps, LruCacheOptions } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type {
  EvictionListener,
  EvictionReason,
  Unsubscribe,
} from "./ports/eviction-listener"
