/**
 * Bounded async FIFO channel.
 *
 * `send` waits while the buffer is full; `receive` waits while it is empty.
 * After `close`, pending and future sends resolve to `false`, and receivers
 * drain what is buffered before seeing `done`.
 */

interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
  detach?: () => void;
}

export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  readonly capacity: number;

  /**
   * @param capacity Buffered items before `send` waits; Infinity for unbounded
   */
  constructor(capacity: number) {
    if (!(capacity >= 0)) {
      throw new RangeError(`Channel capacity must be >= 0, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Items currently buffered */
  get length(): number {
    return this.buffer.length;
  }

  /**
   * @returns true once the value is buffered or handed to a receiver,
   *   false if the channel closed or the signal aborted first
   */
  send(value: T, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const pending: PendingSend<T> = { value, resolve };
      if (signal) {
        const onAbort = () => {
          const index = this.senders.indexOf(pending);
          if (index !== -1) {
            this.senders.splice(index, 1);
            resolve(false);
          }
        };
        signal.addEventListener('abort', onAbort, { once: true });
        pending.detach = () => signal.removeEventListener('abort', onAbort);
      }
      this.senders.push(pending);
    });
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitSender();
      return Promise.resolve({ value, done: false });
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.detach?.();
      sender.resolve(true);
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => this.receivers.push(resolve));
  }

  /**
   * Stop accepting values. Waiting senders are refused; buffered values
   * remain readable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.detach?.();
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  /**
   * Remove and return everything buffered
   */
  drain(): T[] {
    return this.buffer.splice(0);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  }

  private admitSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      sender.detach?.();
      this.buffer.push(sender.value);
      sender.resolve(true);
    }
  }
}
