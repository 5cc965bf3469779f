// Fixed-capacity least recently used cache
import { CACHE_DEFAULTS } from './constants';

interface LRUNode<K, V> {
  key: K;
  value: V;
  prev: LRUNode<K, V> | null;
  next: LRUNode<K, V> | null;
}

/**
 * Key/value store that evicts the least recently used entry once it holds
 * more than `maxSize` entries. Nodes form a doubly-linked list ordered from
 * most recently used (head) to least recently used (tail).
 *
 * Every operation is synchronous and completes before any other caller can
 * observe the list, so no locking is needed around it. A `maxSize` of 0
 * retains nothing.
 */
export class LRUCache<K, V> {
  private readonly nodes = new Map<K, LRUNode<K, V>>();
  private head: LRUNode<K, V> | null = null;
  private tail: LRUNode<K, V> | null = null;

  constructor(private readonly maxSize: number = CACHE_DEFAULTS.MAX_CACHE_SIZE) {}

  /**
   * Get the value for `key` and mark it as most recently used.
   */
  get(key: K): V | undefined {
    const node = this.nodes.get(key);
    if (!node) {
      return undefined;
    }
    this.moveToHead(node);
    return node.value;
  }

  /**
   * Associate `value` with `key` unless the key is already present. An
   * existing key keeps its value and its position.
   *
   * @returns true when the value was inserted
   */
  putIfAbsent(key: K, value: V): boolean {
    if (this.nodes.has(key)) {
      return false;
    }
    const node: LRUNode<K, V> = { key, value, prev: null, next: null };
    this.nodes.set(key, node);
    this.moveToHead(node);
    if (this.nodes.size > this.maxSize && this.tail) {
      this.nodes.delete(this.tail.key);
      this.unlink(this.tail);
    }
    return true;
  }

  size(): number {
    return this.nodes.size;
  }

  private moveToHead(node: LRUNode<K, V>): void {
    if (node === this.head) {
      return;
    }
    this.unlink(node);
    node.next = this.head;
    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;
    if (!this.tail) {
      this.tail = node;
    }
  }

  private unlink(node: LRUNode<K, V>): void {
    if (node === this.head) {
      this.head = node.next;
    }
    if (node === this.tail) {
      this.tail = node.prev;
    }
    if (node.prev) {
      node.prev.next = node.next;
    }
    if (node.next) {
      node.next.prev = node.prev;
    }
    node.prev = null;
    node.next = null;
  }
}
