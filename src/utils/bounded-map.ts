/**
 * BoundedMap — least-recently-used map with a fixed capacity.
 *
 * Recency is the insertion order of the backing Map: a read or write moves
 * the key to the end, and the first key is the one evicted.
 */

export type EvictionHandler<K, V> = (key: K, value: V) => void;

export class BoundedMap<K, V> {
  private readonly map = new Map<K, { value: V }>();

  constructor(
    private readonly maxSize: number,
    private readonly onEvict?: EvictionHandler<K, V>,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`BoundedMap maxSize must be a positive integer, got ${maxSize}`);
    }
  }

  /**
   * Read a value and mark it most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  /**
   * Read without touching recency.
   */
  peek(key: K): V | undefined {
    return this.map.get(key)?.value;
  }

  set(key: K, value: V): this {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (this.map.size >= this.maxSize) {
      this.evictOldest();
    }
    this.map.set(key, { value });
    return this;
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  get size(): number {
    return this.map.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  clear(): void {
    this.map.clear();
  }

  /**
   * Entries from least to most recently used.
   */
  *entries(): IterableIterator<[K, V]> {
    for (const [key, entry] of this.map) {
      yield [key, entry.value];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  private evictOldest(): void {
    const oldest = this.map.entries().next();
    if (oldest.done) return;
    const [key, entry] = oldest.value;
    this.map.delete(key);
    this.onEvict?.(key, entry.value);
  }
}
