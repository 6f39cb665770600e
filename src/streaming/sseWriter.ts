import { Mutex } from '../core/Mutex.js';
import { describeError, type TransportWriteError } from '../types/errors.js';
import {
  HALTED,
  linkAbort,
  nextOrHalt,
  toTransportError,
  type StreamResult,
  type WriterState,
} from './lifecycle.js';
import { type StreamLogger } from './logger.js';
import { SSE_HEADERS, type StreamTransport } from './transport.js';

export interface SSEOptions {
  /** Interval between `: keep-alive` comments */
  heartbeatIntervalMs: number;
  /** Write every frame as soon as it is encoded */
  flushAfterWrite: boolean;
  /** Error frames carry a `retry:` hint when greater than zero */
  maxRetries: number;
  /** Buffered bytes that force a write when flushAfterWrite is off */
  bufferSize: number;
  /** Prefix frames with a numeric `id:` for client replay */
  includeId: boolean;
}

export const DEFAULT_SSE_OPTIONS: Readonly<SSEOptions> = Object.freeze({
  heartbeatIntervalMs: 15_000,
  flushAfterWrite: true,
  maxRetries: 3,
  bufferSize: 4096,
  includeId: false,
});

export const DEFAULT_RETRY_HINT_MS = 5000;

export interface SSEFrame {
  event?: string;
  data: string;
  /** Error frames may carry a retry hint */
  isError?: boolean;
  retryAfterMs?: number;
}

/**
 * Serialize one frame:
 *
 *   id: <n>          (optional)
 *   event: <name>    (optional)
 *   retry: <ms>      (optional)
 *   data: <line>     (one per payload line)
 *   <blank line>
 */
export function formatSSEFrame(frame: SSEFrame, id?: number, retryMs?: number): string {
  let out = '';
  if (id !== undefined) out += `id: ${id}\n`;
  if (frame.event) out += `event: ${frame.event}\n`;
  if (retryMs !== undefined) out += `retry: ${retryMs}\n`;
  for (const line of frame.data.split('\n')) {
    out += `data: ${line}\n`;
  }
  return `${out}\n`;
}

export const KEEP_ALIVE_COMMENT = ': keep-alive\n\n';

/**
 * Server-Sent Events writer for one connection.
 *
 * Two loops share the transport: the event loop and the heartbeat timer.
 * Every write goes through the mutex so frames never interleave. Once a
 * write fails nothing else is written; the failure is rethrown to the
 * caller, whose only option is to log it.
 */
export class SSEWriter {
  private readonly options: SSEOptions;
  private readonly mutex = new Mutex();
  private readonly halt = new AbortController();
  private state: WriterState = 'idle';
  private buffer = '';
  private eventId = 0;
  private written = 0;
  private skipped = 0;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private failure: TransportWriteError | null = null;

  constructor(
    private readonly transport: StreamTransport,
    options: Partial<SSEOptions> = {},
    private readonly logger?: StreamLogger
  ) {
    this.options = { ...DEFAULT_SSE_OPTIONS, ...options };
  }

  get currentState(): WriterState {
    return this.state;
  }

  /** Frames written and events skipped so far */
  get progress(): { written: number; skipped: number } {
    return { written: this.written, skipped: this.skipped };
  }

  /**
   * Stream `events` until exhausted, then write `terminal`.
   * `encode` returning undefined skips the event. When `encode` throws,
   * `recover` supplies a replacement frame; without it the stream ends
   * and the error is rethrown.
   */
  async stream<T>(
    events: AsyncIterable<T>,
    encode: (event: T) => SSEFrame | undefined,
    terminal: SSEFrame,
    signal?: AbortSignal,
    recover?: (event: T, err: unknown) => SSEFrame
  ): Promise<StreamResult> {
    if (this.state !== 'idle') {
      throw new Error(`SSEWriter already used (state: ${this.state})`);
    }

    if (signal?.aborted) {
      this.state = 'aborted';
      return { outcome: 'cancelled', ...this.progress };
    }

    this.state = 'streaming';
    this.transport.open({ ...SSE_HEADERS });
    const unlink = linkAbort(signal, this.halt);
    this.startHeartbeat();

    const iterator = events[Symbol.asyncIterator]();

    try {
      for (;;) {
        const next = await nextOrHalt(iterator, this.halt.signal);
        if (next === HALTED) break;
        if (next.done) break;

        const frame = this.encodeEvent(next.value, encode, recover);
        if (!frame) {
          this.skipped++;
          continue;
        }
        await this.writeFrame(frame, false);
        this.written++;
      }

      if (this.failure) throw this.failure;
      if (this.halt.signal.aborted) {
        this.abort();
        return { outcome: 'cancelled', ...this.progress };
      }

      this.state = 'completing';
      this.stopHeartbeat();
      await this.writeFrame(terminal, true);
      this.transport.end();
      return { outcome: 'completed', ...this.progress };
    } catch (err) {
      this.abort();
      // Writes still work: end the response without a terminal frame
      if (!this.failure) this.transport.end();
      throw this.failure ?? err;
    } finally {
      unlink();
    }
  }

  private encodeEvent<T>(
    event: T,
    encode: (event: T) => SSEFrame | undefined,
    recover: ((event: T, err: unknown) => SSEFrame) | undefined
  ): SSEFrame | undefined {
    try {
      return encode(event);
    } catch (err) {
      if (!recover) throw err;
      this.logger?.warn({ err: describeError(err) }, 'stream: event could not be encoded');
      return recover(event, err);
    }
  }

  private abort(): void {
    this.state = 'aborted';
    this.stopHeartbeat();
    this.halt.abort();
  }

  private async writeFrame(frame: SSEFrame, forceFlush: boolean): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.failure) throw this.failure;

      this.eventId++;
      const id = this.options.includeId ? this.eventId : undefined;
      const retry =
        frame.isError && this.options.maxRetries > 0
          ? frame.retryAfterMs ?? DEFAULT_RETRY_HINT_MS
          : undefined;
      this.buffer += formatSSEFrame(frame, id, retry);

      if (
        forceFlush ||
        this.options.flushAfterWrite ||
        Buffer.byteLength(this.buffer) >= this.options.bufferSize
      ) {
        await this.flushLocked();
      }
    });
  }

  /** Caller must hold the mutex */
  private async flushLocked(): Promise<void> {
    if (this.buffer === '') return;
    const chunk = this.buffer;
    this.buffer = '';
    try {
      await this.transport.write(chunk);
    } catch (err) {
      this.failure = toTransportError(err);
      this.halt.abort();
      throw this.failure;
    }
  }

  private startHeartbeat(): void {
    if (this.options.heartbeatIntervalMs <= 0) return;
    this.heartbeatTimer = setInterval(() => {
      void this.heartbeat();
    }, this.options.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private async heartbeat(): Promise<void> {
    try {
      await this.mutex.runExclusive(async () => {
        if (this.state !== 'streaming' || this.failure) return;
        // Also pushes out frames held back when flushAfterWrite is off
        this.buffer += KEEP_ALIVE_COMMENT;
        await this.flushLocked();
      });
    } catch (err) {
      // flushLocked recorded the failure and halted the event loop
      this.stopHeartbeat();
      this.logger?.debug(
        { err: describeError(err) },
        'stream: heartbeat write failed'
      );
    }
  }
}
