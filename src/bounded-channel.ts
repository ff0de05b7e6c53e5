// Single-consumer async queue with a fixed capacity. send() suspends while the
// buffer is full, which is how a slow consumer pauses the producer.

export class ChannelClosedError extends Error {
  constructor() {
    super("channel closed");
    this.name = "ChannelClosedError";
  }
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly blockedSenders: Array<() => void> = [];
  private pendingReceive: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.blockedSenders.push(resolve));
    }
    if (this.closed) throw new ChannelClosedError();

    if (this.pendingReceive) {
      const deliver = this.pendingReceive;
      this.pendingReceive = null;
      deliver({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  async receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.splice(0, 1)[0];
      this.blockedSenders.shift()?.();
      return { value, done: false };
    }
    if (this.closed) return { value: undefined, done: true };
    return new Promise((resolve) => {
      this.pendingReceive = resolve;
    });
  }

  /** Buffered values stay readable; blocked and future senders fail. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.pendingReceive) {
      const deliver = this.pendingReceive;
      this.pendingReceive = null;
      deliver({ value: undefined, done: true });
    }
    for (const wake of this.blockedSenders.splice(0)) wake();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        this.buffer.length = 0;
        return { value: undefined, done: true };
      },
    };
  }
}
