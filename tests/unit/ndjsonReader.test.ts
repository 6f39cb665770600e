import { describe, it, expect, vi } from 'vitest';
import { toDirectRecord } from '../../src/streaming/directFormat.js';
import { readNDJSONEvents, readNDJSONLines } from '../../src/streaming/ndjsonReader.js';
import { NDJSONWriter } from '../../src/streaming/ndjsonWriter.js';
import { iterateSource, type SourceStream, type StreamEvent } from '../../src/types/events.js';
import { StreamError } from '../../src/types/errors.js';
import { finish, start, text, TS } from '../fixtures/events.js';
import { MemoryTransport } from '../fixtures/memoryTransport.js';

async function* from<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

async function collect(source: SourceStream): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of iterateSource(source)) events.push(event);
  return events;
}

const now = () => TS;

describe('readNDJSONLines', () => {
  it('joins lines split across chunks and skips blank ones', async () => {
    const lines: string[] = [];
    for await (const line of readNDJSONLines(from(['{"a":', '1}\r\n\n', Buffer.from('{"b":2}')]))) {
      lines.push(line);
    }
    expect(lines).toEqual(['{"a":1}', '{"b":2}']);
  });
});

describe('readNDJSONEvents', () => {
  it('reads back what the writer produced in direct framing', async () => {
    const events: StreamEvent[] = [
      start(),
      text('The '),
      { type: 'tool_call', toolId: 'call_1', toolName: 'lookup', input: '{"q":"fox"}', timestamp: TS },
      { type: 'finish_step', stepNumber: 1, timestamp: TS },
      finish(12, 'stop'),
    ];
    const sink = new MemoryTransport();
    await new NDJSONWriter(sink, { flushIntervalMs: 0 }).stream(from(events), toDirectRecord, {
      type: 'done',
      finished: true,
    });

    const decoded = await collect(readNDJSONEvents(from(sink.chunks), { now }));

    expect(decoded).toEqual(events);
  });

  it('restores structured errors from their code', async () => {
    const record = toDirectRecord({
      type: 'error',
      error: new StreamError('rate_limited', 'Slow down'),
      timestamp: TS,
    });

    const [event] = await collect(readNDJSONEvents(from([`${JSON.stringify(record)}\n`]), { now }));

    expect(event?.type).toBe('error');
    const error = event?.type === 'error' ? event.error : undefined;
    expect(error).toBeInstanceOf(StreamError);
    expect(error).toMatchObject({ code: 'rate_limited', message: 'Slow down' });
  });

  it('converts Unix-second timestamps to milliseconds', async () => {
    const decoded = await collect(
      readNDJSONEvents(from(['{"type":"start","timestamp":1700000001}\n']), { now })
    );
    expect(decoded).toEqual([{ type: 'start', timestamp: 1700000001000 }]);
  });

  it('passes unrecognised records through as raw events', async () => {
    const decoded = await collect(
      readNDJSONEvents(from(['{"object":"chat.completion.chunk"}\n{"type":"text_delta"}\n']), { now })
    );
    expect(decoded).toEqual([
      { type: 'raw', raw: { object: 'chat.completion.chunk' }, timestamp: TS },
      { type: 'raw', raw: { type: 'text_delta' }, timestamp: TS },
    ]);
  });

  it('stops at the done line', async () => {
    const decoded = await collect(
      readNDJSONEvents(
        from(['{"type":"text_delta","text":"a"}\n{"type":"done","finished":true}\n{"type":"text_delta","text":"b"}\n']),
        { now }
      )
    );
    expect(decoded).toEqual([text('a')]);
  });

  it('ends with an error event at the first line that is not JSON', async () => {
    const decoded = await collect(
      readNDJSONEvents(
        from(['{"type":"text_delta","text":"a"}\nnot json\n{"type":"text_delta","text":"b"}\n']),
        { now }
      )
    );

    expect(decoded).toHaveLength(2);
    expect(decoded[0]).toEqual(text('a'));
    const error = decoded[1]?.type === 'error' ? decoded[1].error : undefined;
    expect(error).toBeInstanceOf(StreamError);
    expect(error).toMatchObject({ code: 'invalid_ndjson' });
  });

  it('turns a failing body into a final error event', async () => {
    const warn = vi.fn();
    async function* broken(): AsyncGenerator<string> {
      yield '{"type":"text_delta","text":"a"}\n';
      throw new Error('socket hang up');
    }

    const decoded = await collect(readNDJSONEvents(broken(), { now, logger: { debug: vi.fn(), warn } }));

    expect(decoded[0]).toEqual(text('a'));
    expect(decoded[1]).toMatchObject({ type: 'error', timestamp: TS });
    const error = decoded[1]?.type === 'error' ? decoded[1].error : undefined;
    expect(error).toMatchObject({ code: 'read_failed', message: 'socket hang up' });
    expect(warn).toHaveBeenCalledWith({ err: 'socket hang up' }, 'stream: NDJSON body read failed');
  });
});
