type PendingSend<T> = {
  item: T;
  resolve: (delivered: boolean) => void;
};

/**
 * Single-consumer queue with a fixed capacity.
 *
 * `send` waits while the buffer is full and resolves `false` once the consumer
 * has cancelled, so a producer never blocks on an abandoned channel.
 * `close` is the producer's end-of-stream: items already buffered are still
 * delivered. `cancel` is the consumer walking away: buffered items are dropped
 * and every waiting sender is released.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pendingSends: PendingSend<T>[] = [];
  private pendingReceive: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private readonly cancelListeners: Array<() => void> = [];
  private isClosed = false;
  private isCancelled = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  get size(): number {
    return this.buffer.length;
  }

  trySend(item: T): boolean {
    if (this.isClosed) {
      return false;
    }
    if (this.pendingReceive) {
      const receive = this.pendingReceive;
      this.pendingReceive = null;
      receive({ value: item, done: false });
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return true;
    }
    return false;
  }

  send(item: T): Promise<boolean> {
    if (this.trySend(item)) {
      return Promise.resolve(true);
    }
    if (this.isClosed) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      this.pendingSends.push({ item, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const item = this.buffer.splice(0, 1)[0];
      this.admitPendingSend();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.pendingReceive = resolve;
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.releasePendingSends();
    this.settlePendingReceive();
  }

  cancel(): void {
    if (this.isCancelled) {
      return;
    }
    this.isCancelled = true;
    this.buffer.length = 0;
    this.close();
    this.releasePendingSends();
    for (const listener of this.cancelListeners.splice(0)) {
      listener();
    }
  }

  onCancel(listener: () => void): void {
    if (this.isCancelled) {
      listener();
      return;
    }
    this.cancelListeners.push(listener);
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (!pending) {
      return;
    }
    this.buffer.push(pending.item);
    pending.resolve(true);
  }

  private releasePendingSends(): void {
    for (const pending of this.pendingSends.splice(0)) {
      pending.resolve(false);
    }
  }

  private settlePendingReceive(): void {
    const receive = this.pendingReceive;
    this.pendingReceive = null;
    receive?.({ value: undefined, done: true });
  }
}
