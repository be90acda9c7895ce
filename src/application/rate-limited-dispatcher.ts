import type { Logger } from 'pino';
import type { DispatchItem } from '../domain/index.js';
import type { Clock } from './clock.js';
import type { TaskProducer } from './ports.js';

const BATCH_WINDOW_MS = 1000;

export interface DispatchResult {
  readonly sent: number;
  readonly failed: number;
}

/**
 * Hands dispatch items to the producer at no more than `rate` items per
 * second, paced per batch rather than per item.
 *
 * After every `rate` items the dispatcher sleeps for whatever is left of
 * the one-second window that batch started, then re-anchors. Pacing is
 * best-effort: slow sends simply eat into the window.
 *
 * The batch count and its anchor carry over between `dispatch()` calls,
 * so several calls in a row share one cap. `resetPacing()` starts a fresh
 * window.
 *
 * A failed send is logged and counted; the remaining items still go out.
 */
export class RateLimitedDispatcher {
  private readonly producer: TaskProducer;
  private readonly rate: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private inBatch = 0;
  private batchStart: number | null = null;

  constructor(producer: TaskProducer, rate: number, clock: Clock, log: Logger) {
    if (!Number.isInteger(rate) || rate < 1) {
      throw new RangeError(`Dispatch rate must be a positive integer, got ${rate}`);
    }
    this.producer = producer;
    this.rate = rate;
    this.clock = clock;
    this.log = log;
  }

  /** Drops any partial batch; the next item opens a new window. */
  resetPacing(): void {
    this.inBatch = 0;
    this.batchStart = null;
  }

  async dispatch(items: Iterable<DispatchItem> | AsyncIterable<DispatchItem>): Promise<DispatchResult> {
    let sent = 0;
    let failed = 0;

    for await (const item of items) {
      const batchStart = this.batchStart ?? this.clock.now().getTime();
      this.batchStart = batchStart;
      try {
        await this.producer.send(item);
        sent++;
      } catch (err: unknown) {
        failed++;
        this.log.error(
          { err, entity_type: item.entity_type, entity_key: item.entity_key },
          'Failed to enqueue task',
        );
      }

      this.inBatch++;
      if (this.inBatch < this.rate) continue;

      const remaining = BATCH_WINDOW_MS - (this.clock.now().getTime() - batchStart);
      if (remaining > 0) {
        this.log.debug({ remaining_ms: remaining, batch: this.inBatch }, 'Rate limit reached, pausing');
        await this.clock.sleep(remaining);
      }
      this.inBatch = 0;
      this.batchStart = this.clock.now().getTime();
    }

    return { sent, failed };
  }
}
