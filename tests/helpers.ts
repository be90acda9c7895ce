import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Clock } from '../src/application/clock.js';
import type { EntityStore, TaskProducer } from '../src/application/ports.js';
import type { Candidate, DispatchItem, LeaseMap } from '../src/domain/index.js';

/** Fixed reference instant shared by the time-based tests. */
export const T0 = new Date('2026-01-01T00:00:00Z');

export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export function at(offsetMs: number, base: Date = T0): Date {
  return new Date(base.getTime() + offsetMs);
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/**
 * Clock whose sleep returns immediately after moving time forward.
 * `onSleep` runs after each sleep, e.g. to abort a running driver.
 */
export class FakeClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(to: Date): void {
    this.current = to.getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
  }
}

export interface StoredEntity {
  entity_type: string;
  entity_key: string;
  ts_added: Date;
  last_regular_update: Date;
  leases: Record<string, Date>;
}

/** In-process stand-in for the datastore. */
export class InMemoryEntityStore implements EntityStore {
  readonly records = new Map<string, StoredEntity>();
  readonly fetchCalls: Array<{ entityType: string; before: Date; after: Date }> = [];

  add(entity: StoredEntity): void {
    this.records.set(`${entity.entity_type}/${entity.entity_key}`, entity);
  }

  get(entityType: string, entityKey: string): StoredEntity | undefined {
    return this.records.get(`${entityType}/${entityKey}`);
  }

  async fetchDue(entityType: string, before: Date, after: Date): Promise<Candidate[]> {
    this.fetchCalls.push({ entityType, before, after });
    return [...this.records.values()]
      .filter((e) => e.entity_type === entityType)
      .filter((e) => e.last_regular_update > after && e.last_regular_update <= before)
      .map((e) => ({
        entity_key: e.entity_key,
        last_regular_update: e.last_regular_update,
        ts_added: e.ts_added,
      }));
  }

  async getLeases(entityType: string, entityKey: string): Promise<LeaseMap> {
    return { ...(this.get(entityType, entityKey)?.leases ?? {}) };
  }

  /** Applies a task the way a worker would. */
  apply(item: DispatchItem): void {
    const key = `${item.entity_type}/${item.entity_key}`;
    const entity = this.records.get(key);
    if (entity === undefined) return;

    if (item.delete) {
      this.records.delete(key);
      return;
    }

    for (const update of item.attribute_updates) {
      if (update.attribute === 'last_regular_update' && typeof update.value === 'string') {
        entity.last_regular_update = new Date(update.value);
      }
      if (update.attribute === 'leases' && typeof update.value !== 'string') {
        entity.leases = Object.fromEntries(
          Object.entries(update.value).map(([name, iso]) => [name, new Date(iso)]),
        );
      }
    }
  }
}

/** Producer that records every item, optionally applying it to a store. */
export class RecordingProducer implements TaskProducer {
  readonly items: DispatchItem[] = [];
  private readonly store: InMemoryEntityStore | null;

  constructor(store: InMemoryEntityStore | null = null) {
    this.store = store;
  }

  async send(item: DispatchItem): Promise<void> {
    this.items.push(item);
    this.store?.apply(item);
  }
}
