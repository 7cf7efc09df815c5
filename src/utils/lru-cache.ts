/**
 * LruCache — size-bounded string-keyed cache.
 *
 * O(1) get/set/delete via Map + doubly-linked list. Keys match exactly, the
 * same way the stores match device ids. When set() exceeds maxSize, the
 * least-recently-used entry is evicted.
 */

interface Node<V> {
  key: string;
  value: V;
  prev: Node<V> | null;
  next: Node<V> | null;
}

export class LruCache<V> {
  private map: Map<string, Node<V>> = new Map();
  private head: Node<V> | null = null; // most recently used
  private tail: Node<V> | null = null; // least recently used
  private readonly maxSize: number;

  constructor(maxSize: number) {
    if (maxSize < 1) throw new Error('LruCache maxSize must be >= 1');
    this.maxSize = maxSize;
  }

  /**
   * Get a value and promote it to most-recently-used.
   */
  get(key: string): V | undefined {
    const node = this.map.get(key);
    if (!node) return undefined;
    this.moveToHead(node);
    return node.value;
  }

  set(key: string, value: V): this {
    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      this.moveToHead(existing);
      return this;
    }

    if (this.map.size >= this.maxSize) {
      this.evictTail();
    }

    const node: Node<V> = { key, value, prev: null, next: this.head };
    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;
    if (!this.tail) {
      this.tail = node;
    }
    this.map.set(key, node);
    return this;
  }

  delete(key: string): boolean {
    const node = this.map.get(key);
    if (!node) return false;
    this.removeNode(node);
    this.map.delete(key);
    return true;
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
    this.head = null;
    this.tail = null;
  }

  // ─── Internal ──────────────────────────────────────────────

  private moveToHead(node: Node<V>): void {
    if (node === this.head) return;
    this.removeNode(node);
    node.next = this.head;
    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;
    if (!this.tail) {
      this.tail = node;
    }
  }

  private removeNode(node: Node<V>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }
    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
    node.prev = null;
    node.next = null;
  }

  private evictTail(): void {
    const evicted = this.tail;
    if (!evicted) return;
    this.removeNode(evicted);
    this.map.delete(evicted.key);
  }
}
