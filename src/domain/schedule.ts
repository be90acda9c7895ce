import { ConfigError } from './errors.js';
import { parseInterval, parseLeaseInterval, isIndefinite, type LeaseInterval } from './interval.js';

/**
 * Resolved schedule for one entity type. Intervals are already
 * converted to minutes; built once at startup and never mutated.
 *
 * Map insertion order follows the configuration file, which is the
 * order fired events are reported in.
 */
export interface TypeSchedule {
  readonly entity_type: string;
  readonly events: ReadonlyMap<string, number>;
  readonly leases: ReadonlyMap<string, LeaseInterval>;
}

/** Raw schedule document as read from YAML (validated shape only). */
export interface ScheduleDocument {
  readonly events: Readonly<Record<string, Readonly<Record<string, string>>>>;
  readonly leases: Readonly<Record<string, Readonly<Record<string, string>>>>;
}

/**
 * Resolves a schedule document into one TypeSchedule per entity type.
 *
 * Types named in either `events` or `leases` are included. Any malformed
 * interval rejects the whole document with a ConfigError.
 */
export function buildSchedules(doc: ScheduleDocument): Map<string, TypeSchedule> {
  const types = new Set<string>([...Object.keys(doc.events), ...Object.keys(doc.leases)]);
  const schedules = new Map<string, TypeSchedule>();

  for (const entityType of types) {
    const events = new Map<string, number>();
    for (const [name, text] of Object.entries(doc.events[entityType] ?? {})) {
      const path = `events.${entityType}.${name}`;
      if (text.trim() === '*') {
        throw new ConfigError('"*" is only allowed for lease intervals', path);
      }
      events.set(name, parseInterval(text, path));
    }

    const leases = new Map<string, LeaseInterval>();
    for (const [name, text] of Object.entries(doc.leases[entityType] ?? {})) {
      leases.set(name, parseLeaseInterval(text, `leases.${entityType}.${name}`));
    }

    schedules.set(entityType, { entity_type: entityType, events, leases });
  }

  return schedules;
}

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Coarsest re-check period (minutes) that still lands on every configured
 * interval boundary: the GCD of all event intervals and finite lease
 * intervals. Returns null when the type has nothing to reduce over.
 */
export function cadenceOf(schedule: TypeSchedule): number | null {
  const intervals: number[] = [...schedule.events.values()];
  for (const interval of schedule.leases.values()) {
    if (!isIndefinite(interval)) intervals.push(interval);
  }

  if (intervals.length === 0) return null;
  return intervals.reduce(gcd);
}
