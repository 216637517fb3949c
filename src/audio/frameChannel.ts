// Single-consumer async channel with a bounded backlog.
// When full, push() evicts the oldest queued item so producers never wait.

export interface FrameChannelOptions<T> {
  capacity: number;
  onOverflow?: (dropped: T, depth: number) => void;
}

export class FrameChannel<T> implements AsyncIterable<T> {
  private readonly capacity: number;
  private readonly onOverflow?: (dropped: T, depth: number) => void;
  private items: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(options: FrameChannelOptions<T>) {
    this.capacity = options.capacity === Infinity ? Infinity : Math.max(1, Math.floor(options.capacity));
    this.onOverflow = options.onOverflow;
  }

  public get size(): number {
    return this.items.length;
  }

  public get dropped(): number {
    return this.droppedCount;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel is closed and the item was discarded. */
  public push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return true;
    }

    this.items.push(item);
    while (this.items.length > this.capacity) {
      const evicted = this.items.shift();
      if (evicted === undefined) break;
      this.droppedCount += 1;
      this.onOverflow?.(evicted, this.items.length);
    }
    return true;
  }

  /** Drops every queued item and returns how many were discarded. */
  public clear(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  /**
   * Stops accepting items. Queued items are still delivered unless `discard`
   * is set; a pending consumer is released immediately either way once empty.
   */
  public close(options: { discard?: boolean } = {}): void {
    if (options.discard) {
      this.items = [];
    }
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiter && this.items.length === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  public next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('frame channel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close({ discard: true });
        return { value: undefined, done: true };
      },
    };
  }
}
