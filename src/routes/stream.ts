import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { type ZodError } from 'zod';
import { createAuthMiddleware } from '../middleware/auth.js';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { type StreamProvider } from '../providers/base.js';
import {
  resolveMode,
  resolveTransport,
  runStreamSession,
  type StreamMode,
} from '../streaming/dispatcher.js';
import { type NDJSONOptions } from '../streaming/ndjsonWriter.js';
import { type SSEOptions } from '../streaming/sseWriter.js';
import { CORS_HEADERS, ServerResponseTransport } from '../streaming/transport.js';
import { describeError, RequestValidationError } from '../types/errors.js';
import { type SourceStream } from '../types/events.js';
import { generationRequestSchema, ProviderError } from '../types/request.js';
import { parseRetryAfter } from '../utils/headers.js';

export interface StreamRouteOptions {
  provider: StreamProvider;
  apiKey: string;
  sse?: Partial<SSEOptions>;
  ndjson?: Partial<NDJSONOptions>;
  pipelineCapacity?: number;
}

const STREAM_ROUTES: ReadonlyArray<{ path: string; mode: StreamMode }> = [
  { path: '/v1/stream', mode: 'normalized' },
  { path: '/v1/stream/events', mode: 'normalized' },
  { path: '/v1/stream/sse', mode: 'normalized' },
  { path: '/v1/stream/ndjson', mode: 'normalized' },
  { path: '/v1/chat/completions', mode: 'passthrough' },
];

export function createStreamRoutes(options: StreamRouteOptions) {
  const authMiddleware = createAuthMiddleware(options.apiKey);

  return async function streamRoutes(fastify: FastifyInstance): Promise<void> {
    for (const route of STREAM_ROUTES) {
      fastify.options(route.path, async (_request, reply) => {
        return reply.status(204).headers(CORS_HEADERS).send();
      });

      fastify.post(
        route.path,
        { preHandler: [requestIdMiddleware, authMiddleware] },
        (request, reply) => handleStream(request, reply, route.mode, options)
      );
    }
  };
}

async function handleStream(
  request: FastifyRequest,
  reply: FastifyReply,
  defaultMode: StreamMode,
  options: StreamRouteOptions
): Promise<void> {
  const parsed = generationRequestSchema.safeParse(request.body);
  if (!parsed.success) {
    return sendValidationError(reply, toValidationError(parsed.error));
  }

  let mode: StreamMode;
  try {
    mode = resolveMode(
      firstString(request.headers['x-stream-mode']) ?? queryParam(request.query, 'mode'),
      defaultMode
    );
  } catch (err) {
    if (err instanceof RequestValidationError) return sendValidationError(reply, err);
    throw err;
  }

  const transport = resolveTransport(request.headers.accept, request.url);
  const generation = { ...parsed.data, stream: true };
  const requestId = generation.request_id ?? request.requestId;
  const traceId = firstString(request.headers['x-trace-id']);

  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });

  let source: SourceStream;
  try {
    source = await options.provider.streamText(generation, controller.signal);
  } catch (err) {
    return sendProviderFailure(request, reply, err, controller.signal.aborted);
  }

  if (traceId) void reply.header('x-trace-id', traceId);
  void reply.hijack();

  const result = await runStreamSession({
    transport,
    mode,
    source,
    sink: new ServerResponseTransport(reply.raw, reply.getHeaders()),
    metadata: { requestId, traceId, provider: options.provider.name, model: generation.model },
    sse: options.sse,
    ndjson: options.ndjson,
    pipelineCapacity: options.pipelineCapacity,
    signal: controller.signal,
    logger: request.log,
  });

  request.log.debug(
    { requestId, mode, transport, outcome: result.outcome, written: result.written, skipped: result.skipped },
    'stream: session ended'
  );
}

async function sendValidationError(reply: FastifyReply, err: RequestValidationError): Promise<void> {
  await reply.status(400).send({
    error: {
      message: err.message,
      type: 'invalid_request_error',
      code: err.code,
    },
  });
}

async function sendProviderFailure(
  request: FastifyRequest,
  reply: FastifyReply,
  err: unknown,
  cancelled: boolean
): Promise<void> {
  if (cancelled) {
    request.log.debug({ requestId: request.requestId }, 'stream: cancelled before upstream responded');
    await reply.status(499).send({
      error: {
        message: 'Request cancelled by client',
        type: 'request_cancelled',
        code: 'client_closed_request',
      },
    });
    return;
  }

  if (err instanceof ProviderError) {
    request.log.warn({ provider: err.provider, status: err.status }, 'stream: upstream rejected request');
    const retryAfterMs = parseRetryAfter(err.headers['retry-after']);
    await reply.status(err.status).send({
      error: {
        message: err.message,
        type: err.status >= 500 ? 'api_error' : 'invalid_request_error',
        code: 'provider_error',
        ...(retryAfterMs !== undefined ? { retry_after_ms: retryAfterMs } : {}),
      },
    });
    return;
  }

  const message = describeError(err);
  request.log.warn({ err: message }, 'stream: upstream unavailable');
  await reply.status(502).send({
    error: {
      message,
      type: 'api_error',
      code: 'upstream_unavailable',
    },
  });
}

/**
 * Missing top-level fields get the `missing_<field>` code; everything else
 * is a generic invalid request naming the offending path.
 */
export function toValidationError(error: ZodError): RequestValidationError {
  const issue = error.errors[0];
  if (!issue) return new RequestValidationError('Invalid request body');

  if (issue.path.length === 0) {
    return new RequestValidationError('Request body must be a JSON object');
  }

  const field = String(issue.path[0]);
  const missing =
    issue.path.length === 1 &&
    ((issue.code === 'invalid_type' && issue.received === 'undefined') ||
      (issue.code === 'too_small' && (issue.type === 'array' || issue.type === 'string')));
  if (missing) {
    return new RequestValidationError(`Missing required field: ${field}`, `missing_${field}`);
  }

  return new RequestValidationError(`Invalid field ${issue.path.join('.')}: ${issue.message}`);
}

function firstString(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first === '' ? undefined : first;
}

function queryParam(query: unknown, name: string): string | undefined {
  if (typeof query !== 'object' || query === null) return undefined;
  const value: unknown = Reflect.get(query, name);
  return typeof value === 'string' ? value : undefined;
}
