import type { CacheEntry } from "./cache-entry"
import type { CacheResult } from "./cache-result"
import type { EvictionListener, Unsubscribe } from "./eviction-listener"

/**
 * An in-process key/value cache that never holds more than `capacity`
 * entries.
 *
 * @remarks
 * Every method is synchronous and completes without yielding, so no other
 * task can observe the cache half-way through an operation.
 */
export interface BoundedCache<K, V> {
  /**
   * Maximum number of entries.
   *
   * Assigning a lower value evicts least-recently-used entries until the
   * cache fits; a higher value never evicts. Non-positive or non-integer
   * values throw `InvalidArgumentError` and change nothing.
   */
  capacity: number

  /** Number of entries currently held. Never exceeds `capacity`. */
  readonly count: number

  /**
   * Insert or replace the value for `key` and mark it most recently used.
   *
   * Replacing an existing key never evicts. Inserting a new key into a full
   * cache evicts the least-recently-used entry first.
   */
  add(key: K, value: V): void

  /**
   * Look up `key`. A hit marks the entry most recently used.
   */
  get(key: K): CacheResult<V>

  /** Like `get`, without touching recency. */
  peek(key: K): CacheResult<V>

  has(key: K): boolean

  /** Snapshot of keys, most recently used first. */
  keys(): K[]

  /** Snapshot of entries, most recently used first. */
  entries(): CacheEntry<K, V>[]

  /**
   * Subscribe to evictions. Listeners run in subscription order.
   */
  onEvicted(listener: EvictionListener<K, V>): Unsubscribe
}
