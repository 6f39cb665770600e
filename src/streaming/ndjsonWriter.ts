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
import { NDJSON_HEADERS, type StreamTransport } from './transport.js';

export interface NDJSONOptions {
  /** Pending bytes beyond this size are written out while encoding */
  bufferSize: number;
  /** Periodic flush; 0 disables the timer */
  flushIntervalMs: number;
  /** Compact lines; otherwise single-line JSON with spacing */
  compactJSON: boolean;
  /** Append a Unix-seconds `timestamp` field to every line */
  includeTimestamp: boolean;
}

export const DEFAULT_NDJSON_OPTIONS: Readonly<NDJSONOptions> = Object.freeze({
  bufferSize: 8192,
  flushIntervalMs: 100,
  compactJSON: true,
  includeTimestamp: false,
});

export type NDJSONLine = object;

/**
 * Encode one value as a single NDJSON line (with trailing newline).
 */
export function encodeNDJSONLine(value: unknown, compact: boolean): string {
  if (compact) return `${JSON.stringify(value)}\n`;
  // Structural newlines only: string contents are escaped by JSON.stringify
  return `${JSON.stringify(value, null, 1).replace(/\n\s*/g, ' ')}\n`;
}

/**
 * Newline-delimited JSON writer for one connection.
 * Flushes after every event; the periodic timer bounds staleness of any
 * bytes still pending.
 */
export class NDJSONWriter {
  private readonly options: NDJSONOptions;
  private readonly mutex = new Mutex();
  private readonly halt = new AbortController();
  private state: WriterState = 'idle';
  private pending: Buffer = Buffer.alloc(0);
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private failure: TransportWriteError | null = null;
  private written = 0;
  private skipped = 0;

  constructor(
    private readonly transport: StreamTransport,
    options: Partial<NDJSONOptions> = {},
    private readonly logger?: StreamLogger,
    private readonly now: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_NDJSON_OPTIONS, ...options };
  }

  get currentState(): WriterState {
    return this.state;
  }

  /** Lines written and events skipped so far */
  get progress(): { written: number; skipped: number } {
    return { written: this.written, skipped: this.skipped };
  }

  /**
   * Stream `events` until exhausted, then write `terminal`. A record that
   * cannot be encoded is replaced by `recover`, when given.
   */
  async stream<T>(
    events: AsyncIterable<T>,
    encode: (event: T) => NDJSONLine | undefined,
    terminal: NDJSONLine,
    signal?: AbortSignal,
    recover?: (event: T, err: unknown) => NDJSONLine
  ): Promise<StreamResult> {
    if (this.state !== 'idle') {
      throw new Error(`NDJSONWriter already used (state: ${this.state})`);
    }

    if (signal?.aborted) {
      this.state = 'aborted';
      return { outcome: 'cancelled', ...this.progress };
    }

    this.state = 'streaming';
    this.transport.open({ ...NDJSON_HEADERS });
    const unlink = linkAbort(signal, this.halt);
    this.startFlushTimer();

    const iterator = events[Symbol.asyncIterator]();

    try {
      for (;;) {
        const next = await nextOrHalt(iterator, this.halt.signal);
        if (next === HALTED || next.done) break;

        const text = this.encodeEvent(next.value, encode, recover);
        if (text === undefined) {
          this.skipped++;
          continue;
        }
        await this.writeText(text);
        this.written++;
      }

      if (this.failure) throw this.failure;
      if (this.halt.signal.aborted) {
        this.abort();
        return { outcome: 'cancelled', ...this.progress };
      }

      this.state = 'completing';
      this.stopFlushTimer();
      await this.writeText(this.serialize(terminal));
      this.transport.end();
      return { outcome: 'completed', ...this.progress };
    } catch (err) {
      this.abort();
      // Writes still work: end the response without a terminal line
      if (!this.failure) this.transport.end();
      throw this.failure ?? err;
    } finally {
      unlink();
    }
  }

  private abort(): void {
    this.state = 'aborted';
    this.stopFlushTimer();
    this.halt.abort();
  }

  private serialize(line: NDJSONLine): string {
    const value = this.options.includeTimestamp
      ? { ...line, timestamp: Math.floor(this.now() / 1000) }
      : line;
    return encodeNDJSONLine(value, this.options.compactJSON);
  }

  private encodeEvent<T>(
    event: T,
    encode: (event: T) => NDJSONLine | undefined,
    recover: ((event: T, err: unknown) => NDJSONLine) | undefined
  ): string | undefined {
    try {
      const line = encode(event);
      return line === undefined ? undefined : this.serialize(line);
    } catch (err) {
      if (!recover) throw err;
      this.logger?.warn({ err: describeError(err) }, 'stream: event could not be encoded');
      return this.serialize(recover(event, err));
    }
  }

  /**
   * Every line is flushed as it is written, so the periodic timer is a
   * backstop that normally finds nothing pending.
   */
  private async writeText(text: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.failure) throw this.failure;

      this.pending = Buffer.concat([this.pending, Buffer.from(text, 'utf8')]);

      // Write out full buffers as they fill
      const size = this.options.bufferSize;
      while (size > 0 && this.pending.length >= size) {
        const chunk = this.pending.subarray(0, size);
        this.pending = this.pending.subarray(size);
        await this.writeChunk(chunk);
      }

      await this.flushLocked();
    });
  }

  /** Caller must hold the mutex */
  private async flushLocked(): Promise<void> {
    if (this.pending.length === 0) return;
    const chunk = this.pending;
    this.pending = Buffer.alloc(0);
    await this.writeChunk(chunk);
  }

  private async writeChunk(chunk: Uint8Array): Promise<void> {
    try {
      await this.transport.write(chunk);
    } catch (err) {
      this.failure = toTransportError(err);
      this.halt.abort();
      throw this.failure;
    }
  }

  private startFlushTimer(): void {
    if (this.options.flushIntervalMs <= 0) return;
    this.flushTimer = setInterval(() => {
      void this.periodicFlush();
    }, this.options.flushIntervalMs);
    this.flushTimer.unref();
  }

  private stopFlushTimer(): void {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  private async periodicFlush(): Promise<void> {
    try {
      await this.mutex.runExclusive(async () => {
        if (this.state !== 'streaming' || this.failure) return;
        await this.flushLocked();
      });
    } catch (err) {
      this.stopFlushTimer();
      this.logger?.debug(
        { err: describeError(err) },
        'stream: periodic flush failed'
      );
    }
  }
}
