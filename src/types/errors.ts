export type ErrorCategory =
  | 'unknown'
  | 'transient'
  | 'rate_limit'
  | 'content_filter'
  | 'bad_request'
  | 'auth'
  | 'not_found'
  | 'timeout'
  | 'context_size'
  | 'quota'
  | 'unsupported';

export interface StreamErrorOptions {
  category?: ErrorCategory;
  retryable?: boolean;
  retryAfterMs?: number;
  provider?: string;
  status?: number;
  cause?: unknown;
}

/**
 * Structured error raised by an upstream provider mid-stream.
 * Delivered to clients in-band as an `error` event rather than thrown at
 * the transport.
 */
export class StreamError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;
  readonly provider: string | undefined;
  readonly status: number | undefined;

  constructor(code: string, message: string, options: StreamErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StreamError';
    this.code = code;
    this.category = options.category ?? 'unknown';
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.provider = options.provider;
    this.status = options.status;
  }
}

/**
 * Writing to the client failed after headers were committed.
 * Surfaced to the caller for logging only.
 */
export class TransportWriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportWriteError';
  }
}

/**
 * The inbound request could not be turned into a generation request.
 * Raised before any byte of the stream is written.
 */
export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'invalid_request'
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

/**
 * A decoded wire frame did not match the normalized event schema.
 */
export class WireFormatError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WireFormatError';
  }
}

/**
 * Message text for any thrown value. Objects without a prototype cannot be
 * converted with `String()`, so they fall back to their tag.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  try {
    return String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
