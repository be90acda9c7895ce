import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RateLimitedDispatcher } from '../../src/application/rate-limited-dispatcher.js';
import type { TaskProducer } from '../../src/application/ports.js';
import type { DispatchItem } from '../../src/domain/index.js';
import { FakeClock, fakeLogger } from '../helpers.js';

function items(count: number): DispatchItem[] {
  return Array.from({ length: count }, (_, i) => ({
    entity_type: 'ip',
    entity_key: `198.51.100.${i}`,
    events: [],
    attribute_updates: [],
    delete: false,
  }));
}

describe('RateLimitedDispatcher', () => {
  let clock: FakeClock;
  let log: ReturnType<typeof fakeLogger>;
  let timeline: string[];

  /** Producer that logs each send and spends `costMs` of fake time on it. */
  function producer(costMs = 0): TaskProducer {
    return {
      send: async (item) => {
        timeline.push(item.entity_key);
        clock.advance(costMs);
      },
    };
  }

  beforeEach(() => {
    clock = new FakeClock();
    log = fakeLogger();
    timeline = [];
    clock.onSleep = (ms) => {
      timeline.push(`sleep ${ms}`);
    };
  });

  it('issues 25 items at 10/s in three batches with a pause after each full batch', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(), 10, clock, log);

    const result = await dispatcher.dispatch(items(25));

    expect(result).toEqual({ sent: 25, failed: 0 });
    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(timeline.indexOf('sleep 1000')).toBe(10);
    expect(timeline.lastIndexOf('sleep 1000')).toBe(21);
    expect(timeline).toHaveLength(27);
  });

  it('sleeps only for what is left of the window', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(30), 10, clock, log);

    await dispatcher.dispatch(items(20));

    expect(clock.sleeps).toEqual([700, 700]);
  });

  it('does not sleep when a batch already took longer than a second', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(150), 10, clock, log);

    await dispatcher.dispatch(items(20));

    expect(clock.sleeps).toEqual([]);
  });

  it('never sleeps for fewer items than the rate', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(), 10, clock, log);

    await dispatcher.dispatch(items(9));

    expect(clock.sleeps).toEqual([]);
  });

  it('accepts an async iterable', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(), 2, clock, log);
    async function* source(): AsyncGenerator<DispatchItem> {
      yield* items(3);
    }

    const result = await dispatcher.dispatch(source());

    expect(result).toEqual({ sent: 3, failed: 0 });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('logs a failed send and keeps going', async () => {
    const failing: TaskProducer = {
      send: vi.fn(async (item: DispatchItem) => {
        if (item.entity_key === '198.51.100.1') throw new Error('stream unavailable');
      }),
    };
    const dispatcher = new RateLimitedDispatcher(failing, 10, clock, log);

    const result = await dispatcher.dispatch(items(3));

    expect(result).toEqual({ sent: 2, failed: 1 });
    expect(failing.send).toHaveBeenCalledTimes(3);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ entity_type: 'ip', entity_key: '198.51.100.1', err: expect.any(Error) }),
      'Failed to enqueue task',
    );
  });

  it('carries a partial batch over to the next dispatch call', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(), 10, clock, log);

    await dispatcher.dispatch(items(6));
    await dispatcher.dispatch(items(6));

    expect(clock.sleeps).toEqual([1000]);
    expect(timeline.indexOf('sleep 1000')).toBe(10);
  });

  it('starts a fresh window after resetPacing', async () => {
    const dispatcher = new RateLimitedDispatcher(producer(), 10, clock, log);

    await dispatcher.dispatch(items(6));
    dispatcher.resetPacing();
    await dispatcher.dispatch(items(6));

    expect(clock.sleeps).toEqual([]);
  });

  it('rejects a rate below one', () => {
    expect(() => new RateLimitedDispatcher(producer(), 0, clock, log)).toThrow(RangeError);
  });
});
