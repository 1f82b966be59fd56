/**
 * Bounded hand-off between a station's reader and its worker.
 *
 * push() never waits: when the queue is full the oldest queued item is
 * evicted and returned to the caller, who must report the drop.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues `item`. Returns the evicted item when the queue was full,
   * otherwise null. Items pushed after close() are rejected and returned.
   */
  push(item: T): T | null {
    if (this.closed) {
      return item;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return null;
    }

    let evicted: T | null = null;
    if (this.items.length >= this.capacity) {
      evicted = this.items.shift() ?? null;
    }
    this.items.push(item);
    return evicted;
  }

  /** Next item in FIFO order, or null once the queue is closed. */
  next(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Closes the queue, wakes every waiter with null and returns what was still queued. */
  close(): T[] {
    this.closed = true;
    const remaining = this.items;
    this.items = [];
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve(null));
    return remaining;
  }
}
