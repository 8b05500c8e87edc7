/**
 * Bounded single-consumer queue.
 *
 * When full, pushing drops the oldest queued item: for sync work only the
 * newest entries matter. Closing wakes the consumer and discards whatever is
 * still queued.
 */

export class BoundedChannel<T extends object> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(
    readonly capacity: number,
    private readonly onDrop?: (item: T) => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue an item.
   * @returns false when the channel is closed
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    this.items.push(item);
    if (this.items.length > this.capacity) {
      const dropped = this.items.shift();
      if (dropped) this.onDrop?.(dropped);
    }
    return true;
  }

  /** Next item, or null once the channel is closed */
  receive(): Promise<T | null> {
    const item = this.items.shift();
    if (item) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.receive();
      if (item === null) return;
      yield item;
    }
  }
}
