import { z } from 'zod';

/**
 * Inbound generation request (OpenAI chat shape) and the vendor chunk
 * shape used in passthrough mode.
 */

const messagePartSchema = z.object({
  type: z.enum(['text', 'image_url']),
  text: z.string().optional(),
  image_url: z
    .object({
      url: z.string(),
      detail: z.enum(['auto', 'low', 'high']).optional(),
    })
    .optional(),
});

export const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'function', 'tool']),
  content: z.union([z.string(), z.array(messagePartSchema), z.null()]),
  name: z.string().optional(),
  tool_call_id: z.string().optional(),
});

export const generationRequestSchema = z
  .object({
    model: z.string().min(1, 'Missing required field: model'),
    messages: z.array(chatMessageSchema).min(1, 'Missing required field: messages'),
    stream: z.boolean().optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    top_p: z.number().min(0).max(1).optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    tools: z.array(z.unknown()).optional(),
    tool_choice: z.unknown().optional(),
    user: z.string().optional(),
    request_id: z.string().min(1).optional(),
  })
  .passthrough();

export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type GenerationRequest = z.infer<typeof generationRequestSchema>;

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls';

export interface ChunkToolCall {
  index: number;
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChatStreamChoice {
  index: number;
  delta: {
    role?: 'assistant';
    content?: string;
    tool_calls?: ChunkToolCall[];
  };
  finish_reason: FinishReason | null;
}

export interface UsageInfo {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: ChatStreamChoice[];
  usage?: UsageInfo;
}

/**
 * Error thrown by provider adapters before a stream is established
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number,
    public readonly headers: Record<string, string>,
    message: string,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
