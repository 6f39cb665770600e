import { EVENT_KIND_ORDINALS, type StreamEvent } from '../types/events.js';
import { describeError, StreamError } from '../types/errors.js';
import {
  SCHEMA_VERSION,
  type ErrorData,
  type NormalizedEvent,
  type NormalizedEventType,
} from './wireFormat.js';

export interface NormalizerOptions {
  requestId?: string;
  traceId?: string;
  provider?: string;
  model?: string;
}

/**
 * Maps source events to the stable `gai.events.v1` record.
 *
 * One instance per stream: it owns the 1-based sequence counter and the
 * stream's fixed metadata. Exactly one output per input; never throws.
 */
export class Normalizer {
  private sequence = 0;
  private readonly requestId: string | undefined;
  private readonly traceId: string | undefined;
  private readonly provider: string | undefined;
  private readonly model: string | undefined;

  constructor(options: NormalizerOptions = {}) {
    this.requestId = options.requestId || undefined;
    this.traceId = options.traceId || undefined;
    this.provider = options.provider || undefined;
    this.model = options.model || undefined;
  }

  /** Sequence number of the most recently normalized event (0 before the first) */
  get lastSequence(): number {
    return this.sequence;
  }

  normalize(event: StreamEvent): NormalizedEvent {
    this.sequence += 1;

    const base = {
      schema: SCHEMA_VERSION,
      ts: event.timestamp,
      seq: this.sequence,
      trace_id: this.traceId,
      request_id: this.requestId,
    };

    switch (event.type) {
      case 'start':
        return { ...base, type: 'start', provider: this.provider, model: this.model };

      case 'text_delta':
        return { ...base, type: 'text.delta', text: event.text };

      case 'audio_delta':
        return {
          ...base,
          type: 'audio.delta',
          audio: {
            chunk: Buffer.from(event.chunk).toString('base64'),
            format: event.format?.mime,
          },
        };

      case 'tool_call':
        return {
          ...base,
          type: 'tool.call',
          call_id: event.toolId,
          tool_call: { name: event.toolName, input: parseRawJSON(event.input) },
        };

      case 'tool_result':
        return { ...base, type: 'tool.result', call_id: event.toolId, tool_result: event.result };

      case 'citations':
        return {
          ...base,
          type: 'citations',
          citations: event.citations.map((c) => ({
            uri: c.uri,
            title: c.title,
            start: c.start,
            end: c.end,
          })),
        };

      case 'safety':
        return {
          ...base,
          type: 'safety',
          safety: event.safety
            ? { category: event.safety.category, action: event.safety.action, score: event.safety.score }
            : undefined,
        };

      case 'finish_step':
        return { ...base, type: 'step.end', step: event.stepNumber };

      case 'finish':
        return {
          ...base,
          type: 'finish',
          provider: this.provider,
          model: this.model,
          usage: event.usage
            ? {
                input_tokens: event.usage.inputTokens,
                output_tokens: event.usage.outputTokens,
                total_tokens: event.usage.totalTokens,
              }
            : undefined,
          finish_reason: event.finishReason,
        };

      case 'error':
        return { ...base, type: 'error', error: toErrorData(event.error) };

      case 'raw':
        return { ...base, type: rawType(EVENT_KIND_ORDINALS.raw) };

      default:
        return { ...base, type: rawType(unknownKind(event)) };
    }
  }
}

function rawType(kind: number | string): NormalizedEventType {
  return `raw.${kind}`;
}

/**
 * Kinds outside the union can still arrive from untyped producers.
 */
function unknownKind(event: never): string {
  const value: unknown = event;
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return 'unknown';
}

/**
 * Tool input is raw JSON text. Valid JSON is embedded as a value; anything
 * else is carried as the original string.
 */
function parseRawJSON(input: string): unknown {
  if (input.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(input);
    return parsed;
  } catch {
    return input;
  }
}

export function toErrorData(error: unknown): ErrorData {
  if (error instanceof StreamError) {
    return {
      code: error.code,
      message: error.message,
      retryable: error.retryable || undefined,
      retry_after_ms: error.retryAfterMs,
    };
  }
  return { code: 'internal', message: error === undefined ? 'unknown error' : describeError(error) };
}
