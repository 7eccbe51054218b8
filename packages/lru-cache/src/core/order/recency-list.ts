export type RecencyNode<K, V> = {
  readonly key: K
  value: V
  prev: RecencyNode<K, V> | null
  next: RecencyNode<K, V> | null
}

/**
 * Doubly-linked list ordered by recency: head is the most recently used
 * node, tail the least. Every operation except iteration is O(1).
 *
 * Nodes are handed to the owning map so it can move or unlink them without a
 * search; they must not leave the cache.
 */
export class RecencyList<K, V> implements Iterable<RecencyNode<K, V>> {
  private head: RecencyNode<K, V> | null = null
  private tail: RecencyNode<K, V> | null = null
  private length = 0

  get size(): number {
    return this.length
  }

  pushFront(key: K, value: V): RecencyNode<K, V> {
    const node: RecencyNode<K, V> = { key, value, prev: null, next: null }

    this.linkAtHead(node)
    this.length++

    return node
  }

  moveToFront(node: RecencyNode<K, V>): void {
    if (node === this.head) return

    this.unlink(node)
    this.linkAtHead(node)
  }

  remove(node: RecencyNode<K, V>): void {
    this.unlink(node)
    this.length--
  }

  back(): RecencyNode<K, V> | undefined {
    return this.tail ?? undefined
  }

  *[Symbol.iterator](): Iterator<RecencyNode<K, V>> {
    let node = this.head

    while (node !== null) {
      const next = node.next
      yield node
      node = next
    }
  }

  private linkAtHead(node: RecencyNode<K, V>): void {
    node.prev = null
    node.next = this.head

    if (this.head) this.head.prev = node
    this.head = node

    if (!this.tail) this.tail = node
  }

  private unlink(node: RecencyNode<K, V>): void {
    if (node.prev) node.prev.next = node.next
    else this.head = node.next

    if (node.next) node.next.prev = node.prev
    else this.tail = node.prev

    node.prev = null
    node.next = null
  }
}
