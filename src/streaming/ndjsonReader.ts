import { z } from 'zod';
import { EventChannel } from '../core/EventChannel.js';
import { describeError, StreamError } from '../types/errors.js';
import { type SourceStream, type StreamEvent } from '../types/events.js';
import { type StreamLogger } from './logger.js';

const stamped = { timestamp: z.number().optional() };

const directRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('start'), ...stamped }),
  z.object({ type: z.literal('text_delta'), text: z.string(), ...stamped }),
  z.object({
    type: z.literal('audio_delta'),
    audio: z.object({
      chunk: z.string(),
      format: z
        .object({
          mime: z.string(),
          sampleRate: z.number().optional(),
          channels: z.number().optional(),
          bitDepth: z.number().optional(),
        })
        .optional(),
    }),
    ...stamped,
  }),
  z.object({
    type: z.literal('tool_call'),
    tool_call: z.object({ name: z.string(), id: z.string(), input: z.unknown() }),
    ...stamped,
  }),
  z.object({
    type: z.literal('tool_result'),
    tool_result: z.object({ name: z.string().optional(), id: z.string(), result: z.unknown() }),
    ...stamped,
  }),
  z.object({
    type: z.literal('citations'),
    citations: z.array(
      z.object({
        uri: z.string(),
        title: z.string().optional(),
        start: z.number().int().optional(),
        end: z.number().int().optional(),
      })
    ),
    ...stamped,
  }),
  z.object({
    type: z.literal('safety'),
    safety: z
      .object({
        category: z.string(),
        action: z.enum(['block', 'warn', 'pass']),
        score: z.number(),
        note: z.string().optional(),
      })
      .nullable()
      .optional(),
    ...stamped,
  }),
  z.object({ type: z.literal('finish_step'), step: z.object({ number: z.number().int() }), ...stamped }),
  z.object({
    type: z.literal('finish'),
    usage: z
      .object({
        input_tokens: z.number(),
        output_tokens: z.number(),
        total_tokens: z.number(),
      })
      .optional(),
    finish_reason: z.string().optional(),
    ...stamped,
  }),
  z.object({ type: z.literal('error'), error: z.string(), code: z.string().optional(), ...stamped }),
  z.object({ type: z.literal('raw'), raw: z.unknown(), ...stamped }),
  z.object({ type: z.literal('done') }),
]);

type DirectRecord = z.infer<typeof directRecordSchema>;

export interface NDJSONReaderOptions {
  channelCapacity?: number;
  logger?: StreamLogger;
  now?: () => number;
}

/**
 * Non-blank lines of an NDJSON byte stream, without their line endings.
 */
export async function* readNDJSONLines(body: AsyncIterable<Uint8Array | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffered = '';

  for await (const chunk of body) {
    buffered += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      const line = buffered.slice(0, newline).replace(/\r$/, '');
      buffered = buffered.slice(newline + 1);
      if (line.trim() !== '') yield line;
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.decode();
  const last = buffered.replace(/\r$/, '');
  if (last.trim() !== '') yield last;
}

/**
 * Turn a direct-framed NDJSON body back into a source stream.
 *
 * Reading stops at the `done` line or the end of the body. A line that is
 * not JSON ends the stream with an `invalid_ndjson` error event. Records of
 * unknown shape arrive as `raw` events. Closing the stream stops reading at
 * the next line.
 */
export function readNDJSONEvents(
  body: AsyncIterable<Uint8Array | string>,
  options: NDJSONReaderOptions = {}
): SourceStream {
  const channel = new EventChannel(options.channelCapacity);
  void pumpLines(body, channel, options);
  return channel;
}

async function pumpLines(
  body: AsyncIterable<Uint8Array | string>,
  channel: EventChannel,
  options: NDJSONReaderOptions
): Promise<void> {
  const now = options.now ?? Date.now;

  try {
    for await (const line of readNDJSONLines(body)) {
      if (channel.closed) return;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (err) {
        await channel.emit({
          type: 'error',
          error: new StreamError('invalid_ndjson', `Invalid NDJSON line: ${describeError(err)}`, {
            category: 'bad_request',
          }),
          timestamp: now(),
        });
        return;
      }

      const parsed = directRecordSchema.safeParse(json);
      if (parsed.success && parsed.data.type === 'done') return;

      const event = parsed.success
        ? fromDirectRecord(parsed.data, now)
        : { type: 'raw' as const, raw: json, timestamp: now() };
      if (!event || !(await channel.emit(event))) return;
    }
  } catch (err) {
    options.logger?.warn({ err: describeError(err) }, 'stream: NDJSON body read failed');
    await channel.emit({
      type: 'error',
      error: new StreamError('read_failed', describeError(err), { category: 'transient', cause: err }),
      timestamp: now(),
    });
  } finally {
    channel.end();
  }
}

/** Inverse of `toDirectRecord`. Record timestamps are Unix seconds. */
export function fromDirectRecord(record: DirectRecord, now: () => number = Date.now): StreamEvent | undefined {
  if (record.type === 'done') return undefined;
  const timestamp = record.timestamp === undefined ? now() : record.timestamp * 1000;

  switch (record.type) {
    case 'start':
      return { type: 'start', timestamp };
    case 'text_delta':
      return { type: 'text_delta', text: record.text, timestamp };
    case 'audio_delta':
      return {
        type: 'audio_delta',
        chunk: new Uint8Array(Buffer.from(record.audio.chunk, 'base64')),
        format: record.audio.format,
        timestamp,
      };
    case 'tool_call': {
      const { input } = record.tool_call;
      return {
        type: 'tool_call',
        toolId: record.tool_call.id,
        toolName: record.tool_call.name,
        input: typeof input === 'string' ? input : JSON.stringify(input ?? {}),
        timestamp,
      };
    }
    case 'tool_result':
      return {
        type: 'tool_result',
        toolId: record.tool_result.id,
        toolName: record.tool_result.name,
        result: record.tool_result.result,
        timestamp,
      };
    case 'citations':
      return { type: 'citations', citations: record.citations, timestamp };
    case 'safety':
      return { type: 'safety', safety: record.safety ?? undefined, timestamp };
    case 'finish_step':
      return { type: 'finish_step', stepNumber: record.step.number, timestamp };
    case 'finish':
      return {
        type: 'finish',
        usage: record.usage && {
          inputTokens: record.usage.input_tokens,
          outputTokens: record.usage.output_tokens,
          totalTokens: record.usage.total_tokens,
        },
        finishReason: record.finish_reason,
        timestamp,
      };
    case 'error':
      return {
        type: 'error',
        error: record.code ? new StreamError(record.code, record.error) : new Error(record.error),
        timestamp,
      };
    case 'raw':
      return { type: 'raw', raw: record.raw, timestamp };
  }
}
