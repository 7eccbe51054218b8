import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"

/**
 * Key/value storage that also tracks which entry to evict next.
 *
 * Owns ordering only; enforcing a capacity is the caller's job (see
 * `LruCache`). Implementations keep index and ordering consistent after every
 * call: `size()`, `keys()` and `victim()` always describe the same entries.
 */
export interface EvictionMap<K, V> {
  /**
   * Look up `key`. Implementations may reorder on a hit (touch-on-read).
   */
  get(key: K): CacheResult<V>

  /**
   * Look up `key` without any ordering side effect.
   */
  peek(key: K): CacheResult<V>

  /**
   * Insert or replace the value for `key`. May reorder.
   */
  set(key: K, value: V): void

  /**
   * Returns true if the key was present.
   */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /**
   * The entry the policy would evict next, or `undefined` when empty. Does
   * not remove it.
   */
  victim(): CacheEntry<K, V> | undefined

  /**
   * Keys from the entry evicted last to the entry evicted first.
   */
  keys(): K[]

  entries(): CacheEntry<K, V>[]
}
