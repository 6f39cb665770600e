import { type OutgoingHttpHeaders, type ServerResponse } from 'http';
import { TransportWriteError } from '../types/errors.js';

/**
 * The byte sink a protocol writer streams into.
 * Headers are committed by `open()` before the first body byte.
 */
export interface StreamTransport {
  open(headers: Record<string, string>): void;
  /** Resolves once the chunk was accepted; rejects with TransportWriteError */
  write(chunk: string | Uint8Array): Promise<void>;
  end(): void;
  readonly writable: boolean;
}

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-Idempotency-Key',
} as const;

export const SSE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no', // Critical for nginx
  ...CORS_HEADERS,
});

export const NDJSON_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'Content-Type': 'application/x-ndjson',
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no',
  'Transfer-Encoding': 'chunked',
  ...CORS_HEADERS,
});

/**
 * Node response adapter (Fastify's `reply.raw`).
 * Honours socket backpressure by waiting for `drain`.
 */
export class ServerResponseTransport implements StreamTransport {
  private failure: Error | null = null;

  constructor(
    private readonly res: ServerResponse,
    private readonly extraHeaders: OutgoingHttpHeaders = {}
  ) {
    res.on('error', (err: Error) => {
      this.failure = err;
    });
  }

  get writable(): boolean {
    return this.failure === null && !this.res.destroyed && !this.res.writableEnded;
  }

  open(headers: Record<string, string>): void {
    if (this.res.headersSent) return;
    for (const [name, value] of Object.entries({ ...this.extraHeaders, ...headers })) {
      if (value !== undefined) this.res.setHeader(name, value);
    }
    this.res.writeHead(200);
    this.res.flushHeaders();
  }

  async write(chunk: string | Uint8Array): Promise<void> {
    if (!this.writable) {
      throw new TransportWriteError(
        this.failure ? `Client write failed: ${this.failure.message}` : 'Client connection closed',
        this.failure ?? undefined
      );
    }

    let flushed: boolean;
    try {
      flushed = this.res.write(chunk);
    } catch (err) {
      throw new TransportWriteError('Client write failed', err);
    }
    if (flushed) return;

    await new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        this.res.off('drain', onDrain);
        this.res.off('close', onClose);
        this.res.off('error', onError);
      };
      const onDrain = (): void => {
        cleanup();
        resolve();
      };
      const onClose = (): void => {
        cleanup();
        reject(new TransportWriteError('Client connection closed while draining'));
      };
      const onError = (err: Error): void => {
        cleanup();
        reject(new TransportWriteError(`Client write failed: ${err.message}`, err));
      };
      this.res.once('drain', onDrain);
      this.res.once('close', onClose);
      this.res.once('error', onError);
    });
  }

  end(): void {
    if (this.res.writableEnded || this.res.destroyed) return;
    this.res.end();
  }
}
