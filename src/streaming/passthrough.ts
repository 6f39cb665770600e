import { randomUUID } from 'crypto';
import { type StreamEvent, type StreamEventType } from '../types/events.js';
import { type ChatCompletionChunk, type FinishReason } from '../types/request.js';

export interface PassthroughOptions {
  id?: string;
  model?: string;
  /** Unix seconds stamped on every chunk */
  created?: number;
}

/**
 * Converts source events into OpenAI `chat.completion.chunk` objects.
 *
 * Only text deltas, tool calls and finish map to a chunk; every other kind
 * converts to `undefined` and is skipped by the writer. Skipped kinds are
 * tallied so the session can report them.
 */
export class PassthroughConverter {
  readonly id: string;
  readonly model: string;
  readonly created: number;
  private toolCallIndex = 0;
  private readonly dropped = new Map<StreamEventType, number>();

  constructor(options: PassthroughOptions = {}) {
    this.id = options.id ?? `chatcmpl-${randomUUID().replace(/-/g, '')}`;
    this.model = options.model ?? '';
    this.created = options.created ?? Math.floor(Date.now() / 1000);
  }

  /** Event kinds that had no chunk, with counts */
  get droppedKinds(): ReadonlyMap<StreamEventType, number> {
    return this.dropped;
  }

  convert(event: StreamEvent): ChatCompletionChunk | undefined {
    switch (event.type) {
      case 'text_delta':
        return this.chunk({ content: event.text }, null);

      case 'tool_call':
        return this.chunk(
          {
            tool_calls: [
              {
                index: this.toolCallIndex++,
                id: event.toolId,
                type: 'function',
                function: { name: event.toolName, arguments: event.input },
              },
            ],
          },
          null
        );

      case 'finish': {
        const chunk = this.chunk({}, toFinishReason(event.finishReason));
        chunk.usage = {
          prompt_tokens: event.usage?.inputTokens ?? 0,
          completion_tokens: event.usage?.outputTokens ?? 0,
          total_tokens: event.usage?.totalTokens ?? 0,
        };
        return chunk;
      }

      case 'start':
      case 'audio_delta':
      case 'tool_result':
      case 'citations':
      case 'safety':
      case 'finish_step':
      case 'error':
      case 'raw':
        this.dropped.set(event.type, (this.dropped.get(event.type) ?? 0) + 1);
        return undefined;
    }
  }

  private chunk(
    delta: ChatCompletionChunk['choices'][number]['delta'],
    finishReason: FinishReason | null
  ): ChatCompletionChunk {
    return {
      id: this.id,
      object: 'chat.completion.chunk',
      created: this.created,
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }
}

/**
 * Map a provider finish reason onto the OpenAI vocabulary
 */
function toFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case 'length':
    case 'max_tokens':
      return 'length';
    case 'content_filter':
    case 'safety':
      return 'content_filter';
    case 'tool_calls':
    case 'tool_use':
      return 'tool_calls';
    default:
      return 'stop';
  }
}
