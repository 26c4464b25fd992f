/**
 * BoundedChannel: a FIFO queue with a fixed capacity shared by one or more
 * producers and consumers. `send` waits while the channel is full, which is
 * how a slow consumer pushes back on its producer.
 */

import { ChannelClosedError } from '../core/errors.js';

export type ReceiveResult<T> =
  | { status: 'item'; value: T }
  | { status: 'closed' }
  | { status: 'timeout' };

interface Receiver<T> {
  resolve: (result: ReceiveResult<T>) => void;
  timer?: ReturnType<typeof setTimeout>;
}

interface Sender<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private receivers: Receiver<T>[] = [];
  private senders: Sender<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (capacity < 1) throw new Error('Channel capacity must be at least 1');
  }

  /**
   * Enqueue a value, waiting for room when the channel is full.
   * Rejects with ChannelClosedError once the channel is closed.
   */
  send(value: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());

    const receiver = this.receivers.shift();
    if (receiver) {
      if (receiver.timer) clearTimeout(receiver.timer);
      receiver.resolve({ status: 'item', value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Dequeue the next value. With `timeoutMs`, resolves `timeout` when nothing
   * arrives in time; resolves `closed` once the channel is closed and drained.
   */
  receive(timeoutMs?: number): Promise<ReceiveResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitWaitingSender();
      return Promise.resolve({ status: 'item', value });
    }

    if (this.closed) return Promise.resolve({ status: 'closed' });

    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve({ status: 'timeout' });
    }

    return new Promise<ReceiveResult<T>>((resolve) => {
      const receiver: Receiver<T> = { resolve };
      if (timeoutMs !== undefined) {
        receiver.timer = setTimeout(() => {
          const idx = this.receivers.indexOf(receiver);
          if (idx !== -1) this.receivers.splice(idx, 1);
          resolve({ status: 'timeout' });
        }, timeoutMs);
      }
      this.receivers.push(receiver);
    });
  }

  /**
   * Stop accepting values. Buffered values stay receivable; blocked senders
   * are rejected and idle receivers are told the channel closed.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders) {
      sender.reject(new ChannelClosedError());
    }
    this.senders = [];

    for (const receiver of this.receivers) {
      if (receiver.timer) clearTimeout(receiver.timer);
      receiver.resolve({ status: 'closed' });
    }
    this.receivers = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values buffered and not yet received */
  get length(): number {
    return this.buffer.length;
  }

  /** Producers currently blocked on a full channel */
  get blockedSenders(): number {
    return this.senders.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.status !== 'item') return;
      yield result.value;
    }
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push(sender.value);
      sender.resolve();
    }
  }
}
