import { describe, it, expect, vi } from 'vitest';
import { EventChannel } from '../../src/core/EventChannel.js';
import { Normalizer } from '../../src/streaming/normalizer.js';
import { NormalizedPipeline } from '../../src/streaming/pipeline.js';
import { type NormalizedEvent } from '../../src/streaming/wireFormat.js';
import { ArraySource, FailingSource, finish, start, text, TS } from '../fixtures/events.js';

async function collect(pipeline: NormalizedPipeline): Promise<NormalizedEvent[]> {
  const events: NormalizedEvent[] = [];
  for await (const event of pipeline) events.push(event);
  return events;
}

const settle = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('NormalizedPipeline', () => {
  it('forwards every source event in order', async () => {
    const source = new ArraySource([start(), text('a'), text('b'), finish(2)]);
    const pipeline = new NormalizedPipeline(source, new Normalizer());

    const events = await collect(pipeline);
    await pipeline.done;

    expect(events.map((e) => [e.seq, e.type])).toEqual([
      [1, 'start'],
      [2, 'text.delta'],
      [3, 'text.delta'],
      [4, 'finish'],
    ]);
    expect(pipeline.forwardedCount).toBe(4);
  });

  it('numbers events from concurrent producers without gaps', async () => {
    const channel = new EventChannel(4);
    const produce = async (prefix: string) => {
      for (let i = 0; i < 50; i++) await channel.emit(text(`${prefix}${i}`));
    };
    void Promise.all([produce('a'), produce('b')]).then(() => channel.end());

    const events = await collect(new NormalizedPipeline(channel, new Normalizer(), { capacity: 3 }));

    expect(events.map((e) => e.seq)).toEqual(Array.from({ length: 100 }, (_, i) => i + 1));
    const fromA = events.map((e) => e.text ?? '').filter((t) => t.startsWith('a'));
    expect(fromA).toEqual(Array.from({ length: 50 }, (_, i) => `a${i}`));
  });

  it('stops pulling from the source while the queue is full', async () => {
    const source = new ArraySource(Array.from({ length: 10 }, (_, i) => text(String(i))));
    const next = vi.spyOn(source, 'next');
    const pipeline = new NormalizedPipeline(source, new Normalizer(), { capacity: 2 });

    void pipeline.start();
    await settle();

    // Two buffered, the third read is blocked on the push
    expect(next).toHaveBeenCalledTimes(3);
    expect(pipeline.forwardedCount).toBe(2);

    await pipeline.close();
    await pipeline.done;
  });

  it('close abandons a blocked push, closes the source once and is idempotent', async () => {
    const source = new ArraySource(Array.from({ length: 10 }, (_, i) => text(String(i))));
    const pipeline = new NormalizedPipeline(source, new Normalizer(), { capacity: 1 });

    void pipeline.start();
    await settle();

    await Promise.all([pipeline.close(), pipeline.close()]);
    await pipeline.close();
    await pipeline.done;

    expect(pipeline.closed).toBe(true);
    expect(source.closeCalls).toBe(1);
    expect(pipeline.forwardedCount).toBe(1);
  });

  it('turns a failing source into a final error event', async () => {
    const warn = vi.fn();
    const source = new FailingSource([text('a')], new Error('upstream dropped'));
    const pipeline = new NormalizedPipeline(source, new Normalizer(), {
      logger: { debug: vi.fn(), warn },
    });

    const events = await collect(pipeline);

    expect(events).toHaveLength(2);
    expect(events[1]).toMatchObject({
      type: 'error',
      seq: 2,
      error: { code: 'internal', message: 'upstream dropped' },
    });
    expect(warn).toHaveBeenCalledWith({ err: 'upstream dropped' }, 'stream: source failed while forwarding');
  });

  it('keeps forwarding after an error event whose value has no prototype', async () => {
    const source = new ArraySource([
      start(),
      { type: 'error', error: Object.create(null), timestamp: TS },
      text('after'),
      finish(2),
    ]);
    const pipeline = new NormalizedPipeline(source, new Normalizer());

    const events = await collect(pipeline);

    expect(events.map((e) => [e.seq, e.type])).toEqual([
      [1, 'start'],
      [2, 'error'],
      [3, 'text.delta'],
      [4, 'finish'],
    ]);
    expect(events[1]?.error).toEqual({ code: 'internal', message: '[object Object]' });
  });

  it('resolves done immediately when never started', async () => {
    const pipeline = new NormalizedPipeline(new ArraySource([]), new Normalizer());
    await expect(pipeline.done).resolves.toBeUndefined();
  });
});
