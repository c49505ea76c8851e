/**
 * CircularBuffer — Fixed-size ring buffer with O(1) push.
 *
 * When full, new items overwrite the oldest.
 * toArray() returns items in insertion order (oldest → newest).
 */
export class CircularBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;    // next write position
  private count = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (capacity < 1) throw new Error('CircularBuffer capacity must be >= 1');
    this.capacity = capacity;
    this.buffer = new Array(capacity);
  }

  /**
   * Push an item. If full, overwrites the oldest item and returns it.
   */
  push(item: T): T | undefined {
    const overwritten = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }
    return overwritten;
  }

  /**
   * Remove and return the oldest item.
   */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const tail = (this.head - this.count + this.capacity) % this.capacity;
    const item = this.buffer[tail];
    this.buffer[tail] = undefined;
    this.count--;
    return item;
  }

  /**
   * Returns all items in order oldest → newest.
   */
  toArray(): T[] {
    if (this.count === 0) return [];
    const result: T[] = [];
    const start = (this.head - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const idx = (start + i) % this.capacity;
      result.push(this.buffer[idx] as T);
    }
    return result;
  }

  get length(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count >= this.capacity;
  }

  clear(): void {
    this.buffer = new Array(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
