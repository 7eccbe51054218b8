export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

/**
 * Outcome of a lookup. A miss is a normal result, never an exception, and
 * keeps a stored `undefined` distinguishable from an absent key.
 */
export type CacheResult<T> = CacheHit<T> | CacheMiss
