import { CancelledError } from '@logsweep/core';

/** Producer side of an output channel. */
export interface ChunkSink<T> {
  send(value: T, signal?: AbortSignal): Promise<void>;
}

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed.');
    this.name = 'ChannelClosedError';
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * FIFO queue with a fixed capacity. Sends suspend while the buffer is full and
 * resume in arrival order as the consumer takes values out.
 */
export class BoundedChannel<T> implements ChunkSink<T>, AsyncIterable<T> {
  private readonly buffer: T[] = [];

  private readonly senders: PendingSend<T>[] = [];

  private readonly receivers: Array<(value: T | undefined) => void> = [];

  private closed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, received ${capacity}.`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const pending: PendingSend<T> = {
        value,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      const onAbort = (): void => {
        const index = this.senders.indexOf(pending);
        if (index >= 0) {
          this.senders.splice(index, 1);
        }
        reject(new CancelledError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.senders.push(pending);
    });
  }

  /** Resolves with the next value, or `undefined` once closed and drained. */
  async receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      this.admitSender();
      return value;
    }
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return sender.value;
    }
    if (this.closed) {
      return undefined;
    }
    return await new Promise<T | undefined>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Buffered values stay readable; blocked senders are rejected. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      // `undefined` marks the end of the stream.
      const value = await this.receive();
      if (value === undefined) {
        return;
      }
      yield value;
    }
  }

  private admitSender(): void {
    const sender = this.senders.shift();
    if (!sender) {
      return;
    }
    this.buffer.push(sender.value);
    sender.resolve();
  }
}
