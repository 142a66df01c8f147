/**
 * Fixed-capacity FIFO for bridge output lines.
 *
 * The producer never blocks: when the queue is full the oldest entry is
 * dropped to make room. Consumers read with non-blocking `shift()` /
 * `drain()` between their own sleeps.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private droppedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Entries discarded because the queue was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  push(item: T): void {
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount++;
    }
    this.items.push(item);
  }

  /** Oldest entry, or `undefined` when empty. */
  shift(): T | undefined {
    return this.items.shift();
  }

  /** Remove and return everything queued, oldest first. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  clear(): void {
    this.items.length = 0;
  }
}
