import { request as undiciRequest } from 'undici';
import { z } from 'zod';
import { EventChannel } from '../core/EventChannel.js';
import { type SourceStream, type StreamEvent, type Usage } from '../types/events.js';
import { describeError, StreamError } from '../types/errors.js';
import { ProviderError, type GenerationRequest } from '../types/request.js';
import { type StreamLogger } from '../streaming/logger.js';
import { normalizeHeaders } from '../utils/headers.js';
import { type StreamProvider } from './base.js';

const upstreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().optional(),
                  function: z
                    .object({
                      name: z.string().optional(),
                      arguments: z.string().optional(),
                    })
                    .optional(),
                })
              )
              .optional(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
  error: z
    .object({
      message: z.string(),
      type: z.string().optional(),
      code: z.union([z.string(), z.number()]).nullish(),
    })
    .optional(),
});

type UpstreamChunk = z.infer<typeof upstreamChunkSchema>;

export interface OpenAICompatibleOptions {
  baseUrl: string;
  apiKey?: string;
  /** Reported as the stream's provider */
  name?: string;
  channelCapacity?: number;
  logger?: StreamLogger;
}

interface PendingToolCall {
  id: string;
  name: string;
  args: string;
}

/**
 * Provider for any `/v1/chat/completions` endpoint that streams
 * OpenAI-style SSE. Upstream chunks are parsed into source events; tool
 * call fragments are accumulated and emitted whole.
 */
export class OpenAICompatibleProvider implements StreamProvider {
  readonly name: string;
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAICompatibleOptions) {
    this.name = options.name ?? 'openai';
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async streamText(request: GenerationRequest, signal: AbortSignal): Promise<SourceStream> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal.aborted) controller.abort();
    else signal.addEventListener('abort', onAbort, { once: true });

    const body: Record<string, unknown> = {
      ...request,
      stream: true,
      stream_options: { include_usage: true },
    };
    delete body['request_id'];

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'text/event-stream',
    };
    if (this.options.apiKey) headers['Authorization'] = `Bearer ${this.options.apiKey}`;

    const response = await undiciRequest(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (response.statusCode >= 400) {
      signal.removeEventListener('abort', onAbort);
      const errorBody: unknown = await response.body.json().catch(() => ({}));
      throw new ProviderError(
        this.name,
        response.statusCode,
        normalizeHeaders(response.headers),
        `${this.name} API error: ${response.statusCode}`,
        errorBody
      );
    }

    const channel = new EventChannel(this.options.channelCapacity);
    channel.onClose(() => {
      signal.removeEventListener('abort', onAbort);
      controller.abort();
    });

    void this.pump(response.body, channel, controller.signal).finally(() => {
      signal.removeEventListener('abort', onAbort);
    });

    return channel;
  }

  private async pump(
    body: AsyncIterable<Uint8Array | string>,
    channel: EventChannel,
    signal: AbortSignal
  ): Promise<void> {
    const toolCalls = new Map<number, PendingToolCall>();
    let usage: Usage | undefined;
    let finishReason: string | undefined;

    const emit = (event: StreamEvent): Promise<boolean> => channel.emit(event);

    try {
      if (!(await emit({ type: 'start', timestamp: Date.now() }))) return;

      for await (const data of readSSEData(body)) {
        if (data === '[DONE]') break;

        const chunk = parseChunk(data);
        if (!chunk) {
          if (!(await emit({ type: 'raw', raw: data, timestamp: Date.now() }))) return;
          continue;
        }

        if (chunk.error) {
          await emit({
            type: 'error',
            error: new StreamError(
              String(chunk.error.code ?? chunk.error.type ?? 'upstream_error'),
              chunk.error.message,
              { provider: this.name }
            ),
            timestamp: Date.now(),
          });
          return;
        }

        for (const choice of chunk.choices ?? []) {
          const content = choice.delta?.content;
          if (content) {
            if (!(await emit({ type: 'text_delta', text: content, timestamp: Date.now() }))) return;
          }
          for (const fragment of choice.delta?.tool_calls ?? []) {
            const pending = toolCalls.get(fragment.index) ?? { id: '', name: '', args: '' };
            if (fragment.id) pending.id = fragment.id;
            if (fragment.function?.name) pending.name += fragment.function.name;
            if (fragment.function?.arguments) pending.args += fragment.function.arguments;
            toolCalls.set(fragment.index, pending);
          }
          if (choice.finish_reason) finishReason = choice.finish_reason;
        }

        if (chunk.usage) {
          usage = {
            inputTokens: chunk.usage.prompt_tokens,
            outputTokens: chunk.usage.completion_tokens,
            totalTokens:
              chunk.usage.total_tokens ?? chunk.usage.prompt_tokens + chunk.usage.completion_tokens,
          };
        }
      }

      const ordered = [...toolCalls.entries()].sort(([a], [b]) => a - b);
      for (const [, call] of ordered) {
        const accepted = await emit({
          type: 'tool_call',
          toolId: call.id,
          toolName: call.name,
          input: call.args,
          timestamp: Date.now(),
        });
        if (!accepted) return;
      }

      await emit({ type: 'finish', usage, finishReason, timestamp: Date.now() });
    } catch (err) {
      if (signal.aborted) return;
      this.options.logger?.warn(
        { provider: this.name, err: describeError(err) },
        'stream: upstream read failed'
      );
      await emit({
        type: 'error',
        error: new StreamError('upstream_error', describeError(err), {
          category: 'transient',
          retryable: true,
          provider: this.name,
          cause: err,
        }),
        timestamp: Date.now(),
      });
    } finally {
      channel.end();
    }
  }
}

function parseChunk(data: string): UpstreamChunk | undefined {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return undefined;
  }
  const result = upstreamChunkSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Yield the payload of every `data:` field in an SSE byte stream.
 * Multi-line payloads are joined with newlines; comments and other
 * fields are ignored.
 */
export async function* readSSEData(body: AsyncIterable<Uint8Array | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffered = '';
  let data: string[] = [];

  const takeLine = function* (line: string): Generator<string> {
    if (line === '') {
      if (data.length > 0) yield data.join('\n');
      data = [];
      return;
    }
    if (line.startsWith('data:')) {
      const value = line.slice(5);
      data.push(value.startsWith(' ') ? value.slice(1) : value);
    }
  };

  for await (const chunk of body) {
    buffered += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      const line = buffered.slice(0, newline).replace(/\r$/, '');
      buffered = buffered.slice(newline + 1);
      yield* takeLine(line);
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.decode();
  if (buffered !== '') yield* takeLine(buffered.replace(/\r$/, ''));
  yield* takeLine('');
}
