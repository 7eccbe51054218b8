import type { Logger } from "@tidemark/logger"
import type { EvictionMap } from "../core/eviction/eviction-map"

export type LruCacheOptions = {
  /**
   * Maximum number of entries. Positive integer.
   *
   * Default: `5`.
   */
  capacity: number

  /**
   * Label attached to log entries as `cache`.
   */
  name?: string
}

export type LruCacheDeps<K, V> = {
  /** Default: a no-op logger. */
  logger: Logger

  /**
   * Backing index + recency order. Must be empty when handed over.
   *
   * Default: a new `LruMemoryMap`.
   */
  store: EvictionMap<K, V>
}
