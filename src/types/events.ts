/**
 * Source-side event model.
 * Providers emit these; the normalizer, passthrough converter and direct
 * framing all consume them. The union is closed: adding a kind means
 * updating every exhaustive switch over `StreamEvent['type']`.
 */

export interface AudioFormat {
  mime: string;
  sampleRate?: number;
  channels?: number;
  bitDepth?: number;
}

export interface Citation {
  uri: string;
  title?: string;
  start?: number;
  end?: number;
}

export interface SafetyVerdict {
  category: string;
  action: 'block' | 'warn' | 'pass';
  score: number;
  note?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

interface EventBase {
  /** Epoch milliseconds at which the provider produced the event */
  timestamp: number;
}

export interface StartEvent extends EventBase {
  type: 'start';
}

export interface TextDeltaEvent extends EventBase {
  type: 'text_delta';
  text: string;
}

export interface AudioDeltaEvent extends EventBase {
  type: 'audio_delta';
  chunk: Uint8Array;
  format?: AudioFormat;
}

export interface ToolCallEvent extends EventBase {
  type: 'tool_call';
  toolId: string;
  toolName: string;
  /** Raw JSON arguments exactly as the model produced them */
  input: string;
}

export interface ToolResultEvent extends EventBase {
  type: 'tool_result';
  toolId: string;
  toolName?: string;
  result: unknown;
}

export interface CitationsEvent extends EventBase {
  type: 'citations';
  citations: Citation[];
}

export interface SafetyEvent extends EventBase {
  type: 'safety';
  safety?: SafetyVerdict;
}

export interface FinishStepEvent extends EventBase {
  type: 'finish_step';
  stepNumber: number;
}

export interface FinishEvent extends EventBase {
  type: 'finish';
  usage?: Usage;
  finishReason?: string;
}

export interface ErrorEvent extends EventBase {
  type: 'error';
  error: unknown;
}

export interface RawEvent extends EventBase {
  type: 'raw';
  raw: unknown;
}

export type StreamEvent =
  | StartEvent
  | TextDeltaEvent
  | AudioDeltaEvent
  | ToolCallEvent
  | ToolResultEvent
  | CitationsEvent
  | SafetyEvent
  | FinishStepEvent
  | FinishEvent
  | ErrorEvent
  | RawEvent;

export type StreamEventType = StreamEvent['type'];

/**
 * Ordinal of each source kind, used to name `raw.<n>` normalized events.
 * Read-only lookup data.
 */
export const EVENT_KIND_ORDINALS: Readonly<Record<StreamEventType, number>> = Object.freeze({
  start: 0,
  text_delta: 1,
  audio_delta: 2,
  tool_call: 3,
  tool_result: 4,
  citations: 5,
  safety: 6,
  finish_step: 7,
  finish: 8,
  error: 9,
  raw: 10,
});

/**
 * An ordered, closable sequence of events.
 *
 * `next()` resolves with the next event, or `undefined` once the stream is
 * exhausted or closed. `close()` must unblock pending `next()` calls and stop
 * the producer; calling it more than once is safe.
 */
export interface SourceStream {
  next(): Promise<StreamEvent | undefined>;
  close(): Promise<void>;
}

/**
 * Drain a source stream as an async iterable.
 */
export async function* iterateSource(source: SourceStream): AsyncGenerator<StreamEvent> {
  for (;;) {
    const event = await source.next();
    if (event === undefined) return;
    yield event;
  }
}
