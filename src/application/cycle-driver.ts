import type { Logger } from 'pino';
import {
  cadenceOf,
  type Candidate,
  type DispatchItem,
  type SupplementalEvent,
  type TypeSchedule,
} from '../domain/index.js';
import { planEntity } from './entity-planner.js';
import { RateLimitedDispatcher } from './rate-limited-dispatcher.js';
import type { Clock } from './clock.js';
import type { EntityStore, SupplementalEventSource, TaskProducer } from './ports.js';

const MINUTE_MS = 60_000;

/** Per-type outcome of one cycle. */
export interface TypeReport {
  readonly entity_type: string;
  readonly cadence_minutes: number | null;
  /** True when the type was not processed (no cadence, or fetch failed). */
  readonly skipped: boolean;
  readonly candidates: number;
  readonly updates: number;
  readonly deletes: number;
  readonly events_fired: number;
  readonly errors: number;
}

export interface CycleReport {
  readonly started_at: Date;
  readonly duration_ms: number;
  /** Whether the watermark moved to `started_at` at the end of the cycle. */
  readonly watermark_advanced: boolean;
  readonly types: readonly TypeReport[];
}

export interface CycleDriverOptions {
  readonly schedules: ReadonlyMap<string, TypeSchedule>;
  readonly store: EntityStore;
  readonly producer: TaskProducer;
  readonly supplemental: SupplementalEventSource;
  readonly clock: Clock;
  readonly log: Logger;
  /** Dispatch cap, items per second. */
  readonly rate: number;
  /** Wall-clock period between cycle starts. */
  readonly periodMs: number;
}

interface TypeCounters {
  updates: number;
  deletes: number;
  events_fired: number;
  errors: number;
}

/**
 * Runs the periodic lifecycle pass over every configured entity type.
 *
 * Owns the fetch watermark: it starts at the epoch and moves to a cycle's
 * start time only once every type in that cycle was drained. Cycles never
 * overlap: `run()` awaits each one before waiting for the next slot.
 */
export class CycleDriver {
  private readonly schedules: ReadonlyMap<string, TypeSchedule>;
  private readonly store: EntityStore;
  private readonly supplemental: SupplementalEventSource;
  private readonly dispatcher: RateLimitedDispatcher;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly periodMs: number;
  private watermark = new Date(0);

  constructor(options: CycleDriverOptions) {
    this.schedules = options.schedules;
    this.store = options.store;
    this.supplemental = options.supplemental;
    this.clock = options.clock;
    this.log = options.log;
    this.periodMs = options.periodMs;
    this.dispatcher = new RateLimitedDispatcher(options.producer, options.rate, options.clock, options.log);
  }

  /** Start time of the last fully drained cycle (epoch before the first). */
  get lastFetchTime(): Date {
    return this.watermark;
  }

  /**
   * Runs cycles on a fixed period until `signal` aborts.
   *
   * The abort is only observed between cycles; a cycle in progress runs to
   * completion. An overrunning cycle is followed immediately by the next.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.log.info(
      { types: [...this.schedules.keys()], period_ms: this.periodMs },
      'Updater started',
    );

    while (!signal.aborted) {
      const report = await this.runCycle();
      const nextStart = report.started_at.getTime() + this.periodMs;
      const wait = nextStart - this.clock.now().getTime();
      if (wait > 0 && !signal.aborted) {
        await this.clock.sleep(wait, signal);
      }
    }

    this.log.info('Updater stopped');
  }

  /** One full pass over every entity type. */
  async runCycle(): Promise<CycleReport> {
    const startedAt = this.clock.now();
    const previous = this.watermark;
    const types = [...this.schedules.keys()];
    this.dispatcher.resetPacing();

    let supplemental: SupplementalEvent[] = [];
    try {
      supplemental = await this.supplemental.read(types, startedAt);
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to read supplemental events, continuing without them');
    }

    const reports: TypeReport[] = [];
    for (const schedule of this.schedules.values()) {
      const forType = supplemental.filter((e) => e.entity_type === schedule.entity_type);
      reports.push(await this.processType(schedule, forType, startedAt, previous));
    }

    const drained = reports.every((r) => !r.skipped || r.cadence_minutes === null);
    if (drained) {
      this.watermark = startedAt;
    } else {
      this.log.warn(
        { watermark: previous.toISOString() },
        'Some entity types were not drained, watermark left in place',
      );
    }

    const report: CycleReport = {
      started_at: startedAt,
      duration_ms: this.clock.now().getTime() - startedAt.getTime(),
      watermark_advanced: drained,
      types: reports,
    };

    this.log.info(
      {
        started_at: startedAt.toISOString(),
        duration_ms: report.duration_ms,
        types: reports,
      },
      'Cycle complete',
    );

    return report;
  }

  private async processType(
    schedule: TypeSchedule,
    supplemental: readonly SupplementalEvent[],
    now: Date,
    watermark: Date,
  ): Promise<TypeReport> {
    const entityType = schedule.entity_type;
    const cadence = cadenceOf(schedule);

    const base = {
      entity_type: entityType,
      cadence_minutes: cadence,
      candidates: 0,
      updates: 0,
      deletes: 0,
      events_fired: 0,
      errors: 0,
    };

    if (cadence === null) {
      this.log.debug({ entity_type: entityType }, 'No intervals configured, type skipped');
      return { ...base, skipped: true };
    }

    const cadenceMs = cadence * MINUTE_MS;
    const before = new Date(now.getTime() - cadenceMs);
    const after = new Date(watermark.getTime() - cadenceMs);

    let candidates: Candidate[];
    try {
      candidates = await this.store.fetchDue(entityType, before, after);
    } catch (err: unknown) {
      this.log.error({ err, entity_type: entityType }, 'Failed to fetch candidates, type skipped');
      return { ...base, skipped: true, errors: 1 };
    }

    this.log.debug(
      { entity_type: entityType, count: candidates.length, before, after },
      'Candidates fetched',
    );

    const counters: TypeCounters = { updates: 0, deletes: 0, events_fired: 0, errors: 0 };
    const items = this.planAll(schedule, cadence, candidates, supplemental, now, counters);
    const result = await this.dispatcher.dispatch(items);

    return {
      ...base,
      skipped: false,
      candidates: candidates.length,
      updates: counters.updates,
      deletes: counters.deletes,
      events_fired: counters.events_fired,
      errors: counters.errors + result.failed,
    };
  }

  /**
   * Lazily plans each candidate so dispatch pacing overlaps lease lookups.
   * A failure on one entity is logged and skipped.
   */
  private async *planAll(
    schedule: TypeSchedule,
    cadence: number,
    candidates: readonly Candidate[],
    supplemental: readonly SupplementalEvent[],
    now: Date,
    counters: TypeCounters,
  ): AsyncGenerator<DispatchItem> {
    const entityType = schedule.entity_type;

    for (const candidate of candidates) {
      const entityKey = candidate.entity_key;
      let item: DispatchItem;
      try {
        const leases = await this.store.getLeases(entityType, entityKey);
        const plan = planEntity(schedule, cadence, candidate, leases, supplemental, now);

        for (const lease of plan.verdict.unknown) {
          this.log.error(
            { entity_type: entityType, entity_key: entityKey, lease },
            'Lease not present in configuration, dropped',
          );
        }
        if (plan.verdict.expired.length > 0) {
          this.log.debug(
            { entity_type: entityType, entity_key: entityKey, expired: plan.verdict.expired },
            'Expired leases dropped',
          );
        }

        item = plan.item;
      } catch (err: unknown) {
        counters.errors++;
        this.log.error({ err, entity_type: entityType, entity_key: entityKey }, 'Failed to evaluate entity');
        continue;
      }

      if (item.delete) {
        counters.deletes++;
        this.log.debug({ entity_type: entityType, entity_key: entityKey }, 'All leases expired, deleting');
      } else {
        counters.updates++;
        counters.events_fired += item.events.length;
      }

      yield item;
    }
  }
}
