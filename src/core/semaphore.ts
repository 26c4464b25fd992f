/**
 * AsyncSemaphore: caps how many tasks run at once. Queued tasks start in
 * arrival order; a task whose signal aborts while queued leaves the queue
 * without ever starting.
 */

export interface PermitOptions {
  signal?: AbortSignal;
  /** Error a queued task rejects with when its signal aborts */
  onAbort?: () => Error;
}

interface Waiter {
  start: () => void;
}

export class AsyncSemaphore {
  private running = 0;
  private readonly queue: Waiter[] = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  /** Run `task` once a slot is free; the slot is released when it settles. */
  async run<T>(task: () => Promise<T>, options: PermitOptions = {}): Promise<T> {
    await this.enter(options);
    try {
      return await task();
    } finally {
      this.leave();
    }
  }

  /** Tasks currently holding a slot */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a slot */
  get queued(): number {
    return this.queue.length;
  }

  private enter({ signal, onAbort = () => new Error('Aborted while waiting for a slot') }: PermitOptions): Promise<void> {
    if (signal?.aborted) return Promise.reject(onAbort());

    if (this.running < this.limit) {
      this.running++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { start: resolve };
      if (signal) {
        const abort = (): void => {
          const idx = this.queue.indexOf(waiter);
          if (idx !== -1) this.queue.splice(idx, 1);
          reject(onAbort());
        };
        signal.addEventListener('abort', abort, { once: true });
        waiter.start = () => {
          signal.removeEventListener('abort', abort);
          resolve();
        };
      }
      this.queue.push(waiter);
    });
  }

  private leave(): void {
    const next = this.queue.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next.start();
    } else {
      this.running--;
    }
  }
}
