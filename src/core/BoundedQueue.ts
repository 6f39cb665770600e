interface PendingPush<T> {
  item: T;
  resolve: (accepted: boolean) => void;
  signal: AbortSignal | undefined;
  onAbort: (() => void) | undefined;
}

/**
 * Bounded FIFO with blocking push/pop and an explicit close signal.
 *
 * - `push` resolves `true` once the item is buffered, waiting while the queue
 *   is full. It resolves `false` if the queue closes or the signal aborts
 *   before there is room.
 * - `pop` resolves the oldest item, waiting while the queue is empty. After
 *   `close()` the remaining items are still handed out, then `undefined`.
 *
 * `undefined` marks the end of the queue, so items are never nullish.
 */
export class BoundedQueue<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly pushers: PendingPush<T>[] = [];
  private readonly poppers: Array<(item: T | undefined) => void> = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(item: T, signal?: AbortSignal): Promise<boolean> {
    if (this.isClosed || signal?.aborted) return Promise.resolve(false);

    // Hand straight to a waiting consumer
    const popper = this.poppers.shift();
    if (popper) {
      popper(item);
      return Promise.resolve(true);
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const pending: PendingPush<T> = { item, resolve, signal, onAbort: undefined };
      if (signal) {
        pending.onAbort = () => {
          const idx = this.pushers.indexOf(pending);
          if (idx !== -1) this.pushers.splice(idx, 1);
          resolve(false);
        };
        signal.addEventListener('abort', pending.onAbort, { once: true });
      }
      this.pushers.push(pending);
    });
  }

  pop(): Promise<T | undefined> {
    const head = this.items.shift();
    if (head !== undefined) {
      this.admitPusher();
      return Promise.resolve(head);
    }

    if (this.isClosed) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      this.poppers.push(resolve);
    });
  }

  /**
   * Stop accepting items. Blocked producers resolve `false`; blocked
   * consumers resolve `undefined`. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const pusher of this.pushers.splice(0)) {
      this.settlePusher(pusher, false);
    }
    for (const popper of this.poppers.splice(0)) {
      popper(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.pop();
      if (item === undefined) return;
      yield item;
    }
  }

  private admitPusher(): void {
    const pusher = this.pushers.shift();
    if (!pusher) return;
    this.items.push(pusher.item);
    this.settlePusher(pusher, true);
  }

  private settlePusher(pusher: PendingPush<T>, accepted: boolean): void {
    if (pusher.signal && pusher.onAbort) {
      pusher.signal.removeEventListener('abort', pusher.onAbort);
    }
    pusher.resolve(accepted);
  }
}
