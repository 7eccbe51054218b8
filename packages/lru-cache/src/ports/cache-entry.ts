/**
 * A key–value pair copied out of the cache.
 */
export type CacheEntry<K, V> = readonly [K, V]
