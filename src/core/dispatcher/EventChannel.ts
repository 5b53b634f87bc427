type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded FIFO channel with many producers and one consumer.
 *
 * `push` never blocks and never drops an item while the channel is open. After
 * `close()` the consumer still drains what was buffered, then iteration ends;
 * later pushes are refused and reported through the return value.
 */
export class EventChannel<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private receiver: Receiver<T> | null = null;
  private closed = false;

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const receiver = this.receiver;
    if (receiver) {
      this.receiver = null;
      receiver({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve({ value: next, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.receiver) {
      return Promise.reject(new Error('EventChannel already has a waiting consumer'));
    }
    return new Promise((resolve) => {
      this.receiver = resolve;
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const receiver = this.receiver;
    if (receiver) {
      this.receiver = null;
      receiver({ value: undefined, done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.receive();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}
