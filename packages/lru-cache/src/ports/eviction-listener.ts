/**
 * - `"capacity"`: an `add` of a new key found the cache full.
 * - `"resize"`: `capacity` was lowered below the current count.
 */
export type EvictionReason = "capacity" | "resize"

/**
 * Called synchronously for every evicted entry, after the entry is gone from
 * the cache and before the operation that caused it returns.
 *
 * Errors thrown here are not caught; they surface from the `add` or
 * `capacity` assignment that triggered the eviction.
 */
export type EvictionListener<K, V> = (key: K, value: V, reason: EvictionReason) => void

export type Unsubscribe = () => void
