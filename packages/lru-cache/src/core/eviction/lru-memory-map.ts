import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import { type RecencyNode, RecencyList } from "../order/recency-list"
import type { EvictionMap } from "./eviction-map"

export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly index = new Map<K, RecencyNode<K, V>>()
  private readonly order = new RecencyList<K, V>()

  get(key: K): CacheResult<V> {
    const node = this.index.get(key)

    if (node === undefined) return { kind: "miss" }

    this.order.moveToFront(node)

    return { kind: "hit", value: node.value }
  }

  peek(key: K): CacheResult<V> {
    const node = this.index.get(key)

    if (node === undefined) return { kind: "miss" }

    return { kind: "hit", value: node.value }
  }

  set(key: K, value: V): void {
    const node = this.index.get(key)

    if (node) {
      node.value = value
      this.order.moveToFront(node)

      return
    }

    this.index.set(key, this.order.pushFront(key, value))
  }

  delete(key: K): boolean {
    const node = this.index.get(key)

    if (node === undefined) return false

    this.order.remove(node)
    this.index.delete(key)

    return true
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  victim(): CacheEntry<K, V> | undefined {
    const node = this.order.back()

    return node ? [node.key, node.value] : undefined
  }

  keys(): K[] {
    return Array.from(this.order, (node) => node.key)
  }

  entries(): CacheEntry<K, V>[] {
    return Array.from(this.order, (node): CacheEntry<K, V> => [node.key, node.value])
  }
}
