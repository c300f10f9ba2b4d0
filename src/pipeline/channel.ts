import { ChannelClosedError } from '../errors.ts';

interface PendingSend<T> {
  value: T;
  resolve: () => void;
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded single-consumer FIFO connecting two tasks.
 *
 * `send` resolves once the value is buffered (or, at capacity 0, once a
 * receiver has taken it). Closing stops new sends; values already accepted
 * or waiting to be accepted are still handed out before iteration ends.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private closed = false;

  constructor(private readonly capacity = 1) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of values accepted but not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      // a slot opened up, admit the oldest blocked sender
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve({ done: false, value });
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ done: false, value: sender.value });
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    // receivers only wait when nothing is buffered or pending
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}
