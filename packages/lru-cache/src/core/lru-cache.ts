import { createError } from "@tidemark/errors"
import { createNullLogger, type Logger } from "@tidemark/logger"
import type { BoundedCache } from "../ports/bounded-cache"
import type { CacheEntry } from "../ports/cache-entry"
import type { LruCacheDeps, LruCacheOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type {
  EvictionListener,
  EvictionReason,
  Unsubscribe,
} from "../ports/eviction-listener"
import { DEFAULT_CAPACITY, parseCapacity } from "./config/lru-cache-options"
import { EvictionStalledError, InvalidArgumentError } from "./errors/lru-cache.errors"
import type { EvictionMap } from "./eviction/eviction-map"
import { LruMemoryMap } from "./eviction/lru-memory-map"

type Subscription<K, V> = {
  listener: EvictionListener<K, V>
}

/**
 * Fixed-capacity cache that evicts the least-recently-used entry.
 *
 * @remarks
 * Every public method runs synchronously to completion, which makes each one
 * atomic with respect to other tasks on the event loop. Eviction listeners
 * are only called between fully applied steps, so a listener that reads or
 * writes the cache sees a consistent state.
 *
 * @example
 * ```ts
 * const sessions = createLruCache<string, Session>(1000)
 *
 * sessions.onEvicted((id, session) => writeBack(id, session))
 * sessions.add(session.id, session)
 *
 * const res = sessions.get(id)
 * if (res.kind === "hit") touch(res.value)
 * ```
 */
export class LruCache<K, V> implements BoundedCache<K, V> {
  private readonly store: EvictionMap<K, V>
  private readonly logger: Logger
  private subscriptions: readonly Subscription<K, V>[] = []
  private maxEntries: number

  public constructor(
    opts: Partial<LruCacheOptions> = {},
    deps: Partial<LruCacheDeps<K, V>> = {},
  ) {
    this.maxEntries = parseCapacity(opts.capacity ?? DEFAULT_CAPACITY)
    this.store = deps.store ?? new LruMemoryMap<K, V>()

    if (this.store.size() > 0) throw InvalidArgumentError.nonEmptyStore(this.store.size())

    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "lru-cache",
      ...(opts.name !== undefined && { cache: opts.name }),
    })
  }

  get capacity(): number {
    return this.maxEntries
  }

  set capacity(value: number) {
    const next = parseCapacity(value)
    const previous = this.maxEntries

    if (next === previous) return

    // Listeners may refill the cache; never evict more than it held on entry.
    const budget = this.store.size()
    let evicted = 0

    while (this.store.size() > next) {
      if (evicted === budget) {
        throw EvictionStalledError.refilled("resize", {
          evicted,
          size: this.store.size(),
          capacity: next,
        })
      }

      this.evictLeastRecentlyUsed("resize")
      evicted++
    }

    // Published last: while listeners run, `capacity` still covers `count`.
    this.maxEntries = next

    this.logger.info("capacity changed", { from: previous, to: next, evicted })
  }

  get count(): number {
    return this.store.size()
  }

  add(key: K, value: V): void {
    // Re-checked after every eviction: a listener may have added entries,
    // including this key. Evictions are capped at what the cache held on entry.
    const budget = this.store.size()
    let evicted = 0

    for (;;) {
      if (this.store.has(key) || this.store.size() < this.maxEntries) {
        this.store.set(key, value)

        return
      }

      if (evicted === budget) {
        throw EvictionStalledError.refilled("add", {
          evicted,
          size: this.store.size(),
          capacity: this.maxEntries,
        })
      }

      this.evictLeastRecentlyUsed("capacity")
      evicted++
    }
  }

  get(key: K): CacheResult<V> {
    return this.store.get(key)
  }

  peek(key: K): CacheResult<V> {
    return this.store.peek(key)
  }

  has(key: K): boolean {
    return this.store.has(key)
  }

  keys(): K[] {
    return this.store.keys()
  }

  entries(): CacheEntry<K, V>[] {
    return this.store.entries()
  }

  onEvicted(listener: EvictionListener<K, V>): Unsubscribe {
    const subscription: Subscription<K, V> = { listener }

    this.subscriptions = [...this.subscriptions, subscription]

    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== subscription)
    }
  }

  private evictLeastRecentlyUsed(reason: EvictionReason): void {
    const victim = this.store.victim()

    if (victim === undefined) {
      throw createError(
        "invariant_violation",
        "EvictionMap.victim() returned undefined while over capacity",
        { context: { size: this.store.size(), capacity: this.maxEntries }, isOperational: false },
      )
    }

    const [key, value] = victim

    this.store.delete(key)

    this.logger.debug("evicted entry", { reason })

    this.notifyEvicted(key, value, reason)
  }

  private notifyEvicted(key: K, value: V, reason: EvictionReason): void {
    // Listeners (un)subscribing from inside a callback only affect later evictions.
    for (const { listener } of this.subscriptions) {
      listener(key, value, reason)
    }
  }
}

export function createLruCache<K, V>(
  capacity: number = DEFAULT_CAPACITY,
  deps?: Partial<LruCacheDeps<K, V>>,
): LruCache<K, V> {
  return new LruCache<K, V>({ capacity }, deps)
}
