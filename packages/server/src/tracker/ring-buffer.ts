/**
 * Fixed-capacity FIFO history. Pushing past capacity evicts the oldest entry.
 */
export class RingBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number { return this.items.length; }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) this.items.shift();
  }

  /** Most recent entry, if any */
  last(): T | undefined { return this.items[this.items.length - 1]; }

  /** Up to `count` most recent entries, oldest first */
  tail(count: number): T[] {
    return count >= this.items.length ? this.items.slice() : this.items.slice(this.items.length - count);
  }

  toArray(): T[] { return this.items.slice(); }

  clear(): void { this.items = []; }
}
