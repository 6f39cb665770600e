import { BoundedQueue } from '../core/BoundedQueue.js';
import { describeError } from '../types/errors.js';
import { type SourceStream } from '../types/events.js';
import { type Normalizer } from './normalizer.js';
import { type NormalizedEvent } from './wireFormat.js';
import { type StreamLogger } from './logger.js';

export const DEFAULT_PIPELINE_CAPACITY = 100;

export interface PipelineOptions {
  capacity?: number;
  logger?: StreamLogger;
}

/**
 * Drains a source stream through a normalizer into a bounded queue.
 *
 * The forwarding task blocks on the source and, once `capacity` events are
 * buffered, on the queue. `close()` abandons any blocked push, closes the
 * source and is safe to call repeatedly.
 */
export class NormalizedPipeline implements AsyncIterable<NormalizedEvent> {
  private readonly queue: BoundedQueue<NormalizedEvent>;
  private readonly controller = new AbortController();
  private readonly logger: StreamLogger | undefined;
  private forwarding: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private forwarded = 0;

  constructor(
    private readonly source: SourceStream,
    private readonly normalizer: Normalizer,
    options: PipelineOptions = {}
  ) {
    this.queue = new BoundedQueue<NormalizedEvent>(options.capacity ?? DEFAULT_PIPELINE_CAPACITY);
    this.logger = options.logger;
  }

  /** Number of events handed to the queue so far */
  get forwardedCount(): number {
    return this.forwarded;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Start the forwarding task. Calling it again returns the running task.
   */
  start(): Promise<void> {
    if (!this.forwarding) {
      this.forwarding = this.forward();
    }
    return this.forwarding;
  }

  /** Resolves once the forwarding task has exited (immediately if never started). */
  get done(): Promise<void> {
    return this.forwarding ?? Promise.resolve();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<NormalizedEvent> {
    void this.start();
    for (;;) {
      const event = await this.queue.pop();
      if (event === undefined) return;
      yield event;
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.controller.abort();
      this.queue.close();
      this.closing = this.source.close();
    }
    return this.closing;
  }

  private async forward(): Promise<void> {
    const signal = this.controller.signal;
    try {
      while (!signal.aborted) {
        const event = await this.source.next();
        if (event === undefined || signal.aborted) break;

        const accepted = await this.queue.push(this.normalizer.normalize(event), signal);
        if (!accepted) break;
        this.forwarded += 1;
      }
    } catch (err) {
      // A throwing source still ends the stream in-band
      this.logger?.warn(
        { err: describeError(err) },
        'stream: source failed while forwarding'
      );
      const errorEvent = this.normalizer.normalize({ type: 'error', error: err, timestamp: Date.now() });
      if (await this.queue.push(errorEvent, signal)) this.forwarded += 1;
    } finally {
      // End of input: consumers drain what is buffered, then see the end
      this.queue.close();
    }
  }
}
