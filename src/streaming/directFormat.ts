import { type StreamEvent } from '../types/events.js';
import { describeError, StreamError } from '../types/errors.js';

/**
 * Un-normalized framing: one record per source event, keyed by the source
 * type name. No schema, sequence or correlation ids.
 */
export function toDirectRecord(event: StreamEvent): Record<string, unknown> {
  switch (event.type) {
    case 'start':
      return { type: 'start', started: true };

    case 'text_delta':
      return { type: 'text_delta', text: event.text };

    case 'audio_delta':
      return {
        type: 'audio_delta',
        audio: {
          chunk: Buffer.from(event.chunk).toString('base64'),
          format: event.format,
        },
      };

    case 'tool_call':
      return {
        type: 'tool_call',
        tool_call: { name: event.toolName, id: event.toolId, input: event.input },
      };

    case 'tool_result':
      return {
        type: 'tool_result',
        tool_result: { name: event.toolName, id: event.toolId, result: event.result },
      };

    case 'citations':
      return { type: 'citations', citations: event.citations };

    case 'safety':
      return { type: 'safety', safety: event.safety ?? null };

    case 'finish_step':
      return { type: 'finish_step', step: { number: event.stepNumber, finished: true } };

    case 'finish': {
      const record: Record<string, unknown> = { type: 'finish' };
      if (event.usage) {
        record['usage'] = {
          input_tokens: event.usage.inputTokens,
          output_tokens: event.usage.outputTokens,
          total_tokens: event.usage.totalTokens,
        };
      }
      if (event.finishReason) record['finish_reason'] = event.finishReason;
      record['finished'] = true;
      return record;
    }

    case 'error': {
      const message = event.error === undefined ? '' : describeError(event.error);
      const record: Record<string, unknown> = { type: 'error', error: message };
      if (event.error instanceof StreamError) record['code'] = event.error.code;
      return record;
    }

    case 'raw':
      return { type: 'raw', raw: event.raw ?? null };
  }
}

