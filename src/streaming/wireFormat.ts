import { z } from 'zod';
import { WireFormatError } from '../types/errors.js';

/** Current wire format version, carried on every `start` event */
export const SCHEMA_VERSION = 'gai.events.v1';

export const NORMALIZED_EVENT_TYPES = [
  'start',
  'text.delta',
  'audio.delta',
  'tool.call',
  'tool.result',
  'citations',
  'safety',
  'step.end',
  'finish',
  'error',
] as const;

export type KnownEventType = (typeof NORMALIZED_EVENT_TYPES)[number];
export type RawEventType = `raw.${string}`;
export type NormalizedEventType = KnownEventType | RawEventType;

const KNOWN_TYPES: ReadonlySet<string> = new Set(NORMALIZED_EVENT_TYPES);

export function isNormalizedEventType(value: string): value is NormalizedEventType {
  return KNOWN_TYPES.has(value) || /^raw\.[^\s]+$/.test(value);
}

const usageSchema = z.object({
  input_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative().optional(),
});

const errorSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean().optional(),
  retry_after_ms: z.number().int().nonnegative().optional(),
});

const citationSchema = z.object({
  uri: z.string(),
  title: z.string().optional(),
  start: z.number().int().optional(),
  end: z.number().int().optional(),
});

export const normalizedEventSchema = z.object({
  schema: z.string(),
  type: z.string().refine(isNormalizedEventType, { message: 'Unknown event type' }),
  ts: z.number().int(),
  seq: z.number().int().positive(),
  trace_id: z.string().optional(),
  request_id: z.string().optional(),
  step: z.number().int().optional(),
  call_id: z.string().optional(),
  provider: z.string().optional(),
  model: z.string().optional(),
  text: z.string().optional(),
  audio: z
    .object({
      chunk: z.string().optional(),
      format: z.string().optional(),
    })
    .optional(),
  tool_call: z
    .object({
      name: z.string(),
      input: z.unknown(),
    })
    .optional(),
  tool_result: z.unknown().optional(),
  citations: z.array(citationSchema).optional(),
  safety: z
    .object({
      category: z.string(),
      action: z.string(),
      score: z.number(),
    })
    .optional(),
  usage: usageSchema.optional(),
  finish_reason: z.string().optional(),
  error: errorSchema.optional(),
});

/**
 * Provider-independent event record. Field names are the wire names;
 * `JSON.stringify` of a record is its full (non-compact) serialization.
 */
export type NormalizedEvent = z.infer<typeof normalizedEventSchema>;
export type UsageData = z.infer<typeof usageSchema>;
export type ErrorData = z.infer<typeof errorSchema>;
export type CitationData = z.infer<typeof citationSchema>;

/**
 * Compact wire object for a normalized event.
 *
 * Only `start` carries schema, provider and model. `finish` carries no
 * sequence number. Key order is fixed so the output is byte-stable.
 */
export function toWireObject(event: NormalizedEvent): Record<string, unknown> {
  const obj: Record<string, unknown> = {};

  if (event.type === 'start') {
    obj['schema'] = event.schema;
    obj['type'] = event.type;
    obj['ts'] = event.ts;
    obj['seq'] = event.seq;
    if (event.trace_id) obj['trace_id'] = event.trace_id;
    if (event.request_id) obj['request_id'] = event.request_id;
    if (event.provider) obj['provider'] = event.provider;
    if (event.model) obj['model'] = event.model;
    return obj;
  }

  obj['type'] = event.type;
  if (event.type !== 'finish') {
    obj['seq'] = event.seq;
  }

  switch (event.type) {
    case 'text.delta':
      obj['text'] = event.text ?? '';
      break;
    case 'audio.delta':
      if (event.audio) obj['audio'] = event.audio;
      break;
    case 'tool.call':
      obj['call_id'] = event.call_id ?? '';
      obj['name'] = event.tool_call?.name ?? '';
      obj['input'] = event.tool_call?.input ?? null;
      break;
    case 'tool.result':
      obj['call_id'] = event.call_id ?? '';
      obj['output'] = event.tool_result ?? null;
      break;
    case 'citations':
      obj['citations'] = event.citations ?? [];
      break;
    case 'safety':
      if (event.safety) obj['safety'] = event.safety;
      break;
    case 'step.end':
      obj['step'] = event.step ?? 0;
      break;
    case 'finish':
      if (event.usage) obj['usage'] = event.usage;
      if (event.finish_reason) obj['finish_reason'] = event.finish_reason;
      break;
    case 'error':
      if (event.error) {
        obj['code'] = event.error.code;
        obj['message'] = event.error.message;
        if (event.error.retry_after_ms !== undefined && event.error.retry_after_ms > 0) {
          obj['retry_after_ms'] = event.error.retry_after_ms;
        }
      }
      break;
    default:
      // raw.<n> carries only type and sequence
      break;
  }

  return obj;
}

export function toCompactJSON(event: NormalizedEvent): string {
  return JSON.stringify(toWireObject(event));
}

/**
 * Parse a full serialization back into a record.
 * Throws WireFormatError for malformed JSON or shape mismatches.
 */
export function parseNormalizedEvent(data: string): NormalizedEvent {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    throw new WireFormatError('Failed to parse normalized event: invalid JSON', err);
  }

  const result = normalizedEventSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new WireFormatError(`Failed to parse normalized event: ${issues}`, result.error);
  }
  return result.data;
}

/**
 * Only `start` events are checked; other events never carry a schema
 * on the wire.
 */
export function validateSchema(event: NormalizedEvent): void {
  if (event.type === 'start' && event.schema !== SCHEMA_VERSION) {
    throw new WireFormatError(
      `Unsupported schema version: ${event.schema} (expected ${SCHEMA_VERSION})`
    );
  }
}
