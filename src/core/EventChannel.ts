import { BoundedQueue } from './BoundedQueue.js';
import { type SourceStream, type StreamEvent } from '../types/events.js';

export const DEFAULT_CHANNEL_CAPACITY = 100;

/**
 * In-process source stream.
 *
 * Producers call `emit()` (blocks while the buffer is full) and `end()` when
 * finished, and watch `signal` to learn that the consumer closed the stream.
 * Consumers call `next()` and `close()`.
 */
export class EventChannel implements SourceStream {
  private readonly queue: BoundedQueue<StreamEvent>;
  private readonly controller = new AbortController();
  private readonly closeHandlers: Array<() => void | Promise<void>> = [];
  private closing: Promise<void> | null = null;

  constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
    this.queue = new BoundedQueue<StreamEvent>(capacity);
  }

  /** Aborted once the consumer closes the channel */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Publish an event. Resolves `false` when the channel was closed or ended
   * and the event was not accepted.
   */
  emit(event: StreamEvent): Promise<boolean> {
    return this.queue.push(event, this.controller.signal);
  }

  /** Producer is done; buffered events remain readable. */
  end(): void {
    this.queue.close();
  }

  /** Register cleanup that runs once when the consumer closes the channel. */
  onClose(handler: () => void | Promise<void>): void {
    this.closeHandlers.push(handler);
  }

  next(): Promise<StreamEvent | undefined> {
    if (this.closed) return Promise.resolve(undefined);
    return this.queue.pop();
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.controller.abort();
      this.queue.close();
      this.closing = this.runCloseHandlers();
    }
    return this.closing;
  }

  private async runCloseHandlers(): Promise<void> {
    for (const handler of this.closeHandlers.splice(0)) {
      await handler();
    }
  }
}
