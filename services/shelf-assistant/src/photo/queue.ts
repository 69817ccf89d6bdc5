/**
 * Bounded single-consumer queue. When full, the oldest buffered item is
 * dropped: only the freshest framing or hand position matters.
 */
export class PhotoQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly capacity: number,
    private readonly onDrop?: (item: T) => void,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the queue is closed. */
  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return true;
    }
    if (this.items.length >= this.capacity) {
      const oldest = this.items.shift();
      this.droppedCount += 1;
      if (oldest !== undefined) this.onDrop?.(oldest);
    }
    this.items.push(item);
    return true;
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    if (this.waiter) {
      return Promise.reject(new Error("PhotoQueue supports a single consumer"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Buffered items are still delivered; a waiting consumer is released. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
