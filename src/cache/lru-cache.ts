import { SsmlError } from "../core/errors.js";

interface CacheEntry<K, V> {
  key: K;
  value: V;
  prev: CacheEntry<K, V> | null;
  next: CacheEntry<K, V> | null;
}

/**
 * Fixed-capacity map that evicts the least recently used entry.
 *
 * Entries sit in a doubly linked list ordered from most to least recently
 * used, indexed by a `Map`, so `has`, `get` and `set` are O(1). A hit on
 * `has` or `get` counts as a use.
 */
export class LruCache<K, V> {
  readonly capacity: number;
  private readonly entries = new Map<K, CacheEntry<K, V>>();
  private head: CacheEntry<K, V> | null = null;
  private tail: CacheEntry<K, V> | null = null;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new SsmlError(
        "CACHE_INVALID_CAPACITY",
        `Cache capacity must be a positive integer, got ${capacity}.`
      );
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.touch(entry);
    return true;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    this.touch(entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    const existing = this.entries.get(key);
    if (existing) {
      existing.value = value;
      this.touch(existing);
      return;
    }
    if (this.entries.size >= this.capacity && this.tail) {
      const evicted = this.tail;
      this.unlink(evicted);
      this.entries.delete(evicted.key);
    }
    const entry: CacheEntry<K, V> = { key, value, prev: null, next: null };
    this.entries.set(key, entry);
    this.pushFront(entry);
  }

  /** Keys from most to least recently used. Does not change the order. */
  keys(): K[] {
    const keys: K[] = [];
    for (let entry = this.head; entry; entry = entry.next) {
      keys.push(entry.key);
    }
    return keys;
  }

  private touch(entry: CacheEntry<K, V>): void {
    if (this.head === entry) {
      return;
    }
    this.unlink(entry);
    this.pushFront(entry);
  }

  private unlink(entry: CacheEntry<K, V>): void {
    if (entry.prev) {
      entry.prev.next = entry.next;
    } else {
      this.head = entry.next;
    }
    if (entry.next) {
      entry.next.prev = entry.prev;
    } else {
      this.tail = entry.prev;
    }
    entry.prev = null;
    entry.next = null;
  }

  private pushFront(entry: CacheEntry<K, V>): void {
    entry.next = this.head;
    if (this.head) {
      this.head.prev = entry;
    }
    this.head = entry;
    if (!this.tail) {
      this.tail = entry;
    }
  }
}
