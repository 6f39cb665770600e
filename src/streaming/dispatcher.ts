import { iterateSource, type SourceStream, type StreamEvent } from '../types/events.js';
import { describeError, RequestValidationError, StreamError, TransportWriteError } from '../types/errors.js';
import { toDirectRecord } from './directFormat.js';
import { type StreamLogger } from './logger.js';
import { NDJSONWriter, type NDJSONLine, type NDJSONOptions } from './ndjsonWriter.js';
import { Normalizer, type NormalizerOptions } from './normalizer.js';
import { PassthroughConverter } from './passthrough.js';
import { NormalizedPipeline } from './pipeline.js';
import { SSEWriter, type SSEFrame, type SSEOptions } from './sseWriter.js';
import { type StreamResult } from './lifecycle.js';
import { type StreamTransport } from './transport.js';
import { toCompactJSON, toWireObject, type NormalizedEvent } from './wireFormat.js';

export type TransportKind = 'sse' | 'ndjson';
export type StreamMode = 'normalized' | 'passthrough' | 'direct';

export const STREAM_MODES: readonly StreamMode[] = ['normalized', 'passthrough', 'direct'];

const DONE_LINE = { type: 'done', finished: true } as const;
const DONE_FRAME: SSEFrame = { event: 'done', data: JSON.stringify(DONE_LINE) };
const PASSTHROUGH_DONE_FRAME: SSEFrame = { data: '[DONE]' };
const PASSTHROUGH_DONE_LINE = { object: 'done' } as const;

/**
 * Pick the framing from the Accept header, then from path hints.
 * Falls back to SSE.
 */
export function resolveTransport(accept: string | undefined, path: string): TransportKind {
  const acceptValue = (accept ?? '').toLowerCase();
  if (acceptValue.includes('text/event-stream')) return 'sse';
  if (acceptValue.includes('application/x-ndjson') || acceptValue.includes('application/json')) {
    return 'ndjson';
  }

  const pathname = path.split('?')[0] ?? '';
  if (pathname.includes('/events') || pathname.includes('/sse')) return 'sse';
  if (pathname.endsWith('.ndjson') || pathname.includes('/ndjson')) return 'ndjson';

  return 'sse';
}

/**
 * Resolve the mode hint. A missing hint means the route default; an
 * unrecognised one is a client error.
 */
export function resolveMode(hint: string | undefined, fallback: StreamMode): StreamMode {
  if (hint === undefined || hint.trim() === '') return fallback;
  const value = hint.trim().toLowerCase();
  const mode = STREAM_MODES.find((m) => m === value);
  if (!mode) {
    throw new RequestValidationError(
      `Unsupported stream mode: ${hint} (expected one of ${STREAM_MODES.join(', ')})`,
      'invalid_stream_mode'
    );
  }
  return mode;
}

export interface StreamSessionOptions {
  transport: TransportKind;
  mode: StreamMode;
  source: SourceStream;
  sink: StreamTransport;
  /** Correlation metadata stamped by the normalizer and passthrough chunks */
  metadata?: NormalizerOptions;
  sse?: Partial<SSEOptions>;
  ndjson?: Partial<NDJSONOptions>;
  pipelineCapacity?: number;
  signal?: AbortSignal;
  logger?: StreamLogger;
}

export type SessionOutcome = StreamResult['outcome'] | 'failed';

export interface SessionResult {
  outcome: SessionOutcome;
  written: number;
  skipped: number;
  /** A `TransportWriteError` when the client went away mid-write */
  error?: Error;
}

interface Encoders<T> {
  events: AsyncIterable<T>;
  sse: (event: T) => SSEFrame | undefined;
  ndjson: (event: T) => NDJSONLine | undefined;
  /** Replacements for an event whose encoding threw */
  sseFallback: (event: T, err: unknown) => SSEFrame;
  ndjsonFallback: (event: T, err: unknown) => NDJSONLine;
  sseTerminal: SSEFrame;
  ndjsonTerminal: NDJSONLine;
  /** Stops everything upstream of the writer */
  close: () => Promise<void>;
  /** Called once after the writer returned */
  finish?: () => void;
}

const ENCODE_FAILED = 'encode_failed';

/**
 * Run one stream from source to client.
 *
 * The source is always closed before this resolves, whichever way the
 * session ended. Writer failures resolve as `failed` with the counts
 * written so far; they are not thrown.
 */
export async function runStreamSession(options: StreamSessionOptions): Promise<SessionResult> {
  switch (options.mode) {
    case 'normalized':
      return drive(options, normalizedEncoders(options));
    case 'passthrough':
      return drive(options, passthroughEncoders(options));
    case 'direct':
      return drive(options, directEncoders(options));
  }
}

async function drive<T>(options: StreamSessionOptions, encoders: Encoders<T>): Promise<SessionResult> {
  const { logger } = options;
  let progress = (): Omit<StreamResult, 'outcome'> => ({ written: 0, skipped: 0 });

  try {
    let result: StreamResult;
    if (options.transport === 'sse') {
      const writer = new SSEWriter(options.sink, options.sse, logger);
      progress = () => writer.progress;
      result = await writer.stream(
        encoders.events,
        encoders.sse,
        encoders.sseTerminal,
        options.signal,
        encoders.sseFallback
      );
    } else {
      const writer = new NDJSONWriter(options.sink, options.ndjson, logger);
      progress = () => writer.progress;
      result = await writer.stream(
        encoders.events,
        encoders.ndjson,
        encoders.ndjsonTerminal,
        options.signal,
        encoders.ndjsonFallback
      );
    }

    if (result.outcome === 'cancelled') {
      logger?.debug(
        { mode: options.mode, transport: options.transport, written: result.written },
        'stream: cancelled by client'
      );
    }
    return result;
  } catch (err) {
    const error = err instanceof Error ? err : new Error(describeError(err));
    logger?.warn(
      { mode: options.mode, transport: options.transport, err: error.message },
      err instanceof TransportWriteError ? 'stream: write to client failed' : 'stream: session failed'
    );
    return { outcome: 'failed', ...progress(), error };
  } finally {
    await encoders.close();
    encoders.finish?.();
  }
}

function normalizedEncoders(options: StreamSessionOptions): Encoders<NormalizedEvent> {
  const pipeline = new NormalizedPipeline(options.source, new Normalizer(options.metadata), {
    capacity: options.pipelineCapacity,
    logger: options.logger,
  });

  return {
    events: pipeline,
    sse: toNormalizedFrame,
    ndjson: (event) => toWireObject(event),
    sseFallback: (event, err) => toNormalizedFrame(encodeFailure(event, err)),
    ndjsonFallback: (event, err) => toWireObject(encodeFailure(event, err)),
    sseTerminal: DONE_FRAME,
    ndjsonTerminal: DONE_LINE,
    close: async () => {
      await pipeline.close();
      await pipeline.done;
    },
  };
}

function passthroughEncoders(options: StreamSessionOptions): Encoders<StreamEvent> {
  const converter = new PassthroughConverter({ model: options.metadata?.model });

  return {
    events: guardSource(options.source, options.logger),
    sse: (event) => {
      const chunk = converter.convert(event);
      return chunk ? { data: JSON.stringify(chunk) } : undefined;
    },
    ndjson: (event) => converter.convert(event),
    sseFallback: (_event, err) => ({ data: JSON.stringify(passthroughFailure(err)) }),
    ndjsonFallback: (_event, err) => passthroughFailure(err),
    sseTerminal: PASSTHROUGH_DONE_FRAME,
    ndjsonTerminal: PASSTHROUGH_DONE_LINE,
    close: () => options.source.close(),
    finish: () => {
      if (converter.droppedKinds.size === 0) return;
      options.logger?.debug(
        { dropped: Object.fromEntries(converter.droppedKinds) },
        'stream: events without a passthrough chunk were dropped'
      );
    },
  };
}

function directEncoders(options: StreamSessionOptions): Encoders<StreamEvent> {
  return {
    events: guardSource(options.source, options.logger),
    sse: (event) => ({
      event: event.type,
      data: JSON.stringify(toDirectRecord(event)),
      isError: event.type === 'error',
      retryAfterMs: event.type === 'error' && event.error instanceof StreamError
        ? event.error.retryAfterMs
        : undefined,
    }),
    ndjson: (event) => toDirectRecord(event),
    sseFallback: (_event, err) => ({
      event: 'error',
      data: JSON.stringify(directFailure(err)),
      isError: true,
    }),
    ndjsonFallback: (_event, err) => directFailure(err),
    sseTerminal: DONE_FRAME,
    ndjsonTerminal: DONE_LINE,
    close: () => options.source.close(),
  };
}

function toNormalizedFrame(event: NormalizedEvent): SSEFrame {
  return {
    event: event.type,
    data: toCompactJSON(event),
    isError: event.type === 'error',
    retryAfterMs: event.error?.retry_after_ms,
  };
}

/**
 * Error event taking the place of one that could not be serialized.
 * It keeps the sequence number so numbering stays contiguous.
 */
function encodeFailure(event: NormalizedEvent, err: unknown): NormalizedEvent {
  return {
    schema: event.schema,
    type: 'error',
    ts: event.ts,
    seq: event.seq,
    trace_id: event.trace_id,
    request_id: event.request_id,
    error: { code: ENCODE_FAILED, message: describeError(err) },
  };
}

function passthroughFailure(err: unknown) {
  return { error: { message: describeError(err), type: 'api_error', code: ENCODE_FAILED } };
}

function directFailure(err: unknown) {
  return { type: 'error', error: describeError(err), code: ENCODE_FAILED };
}

/**
 * Iterate a source, turning a thrown failure into a final error event.
 */
async function* guardSource(
  source: SourceStream,
  logger: StreamLogger | undefined
): AsyncGenerator<StreamEvent> {
  try {
    yield* iterateSource(source);
  } catch (err) {
    logger?.warn(
      { err: describeError(err) },
      'stream: source failed while forwarding'
    );
    yield { type: 'error', error: err, timestamp: Date.now() };
  }
}
