import type { Candidate, SupplementalEvent } from './entity.js';

const MINUTE_MS = 60_000;
const DAY_MINUTES = 1440;

/** Number of whole intervals elapsed between `from` and `to`. */
function elapsedCount(from: Date, to: Date, intervalMinutes: number): number {
  return Math.floor((to.getTime() - from.getTime()) / (intervalMinutes * MINUTE_MS));
}

/**
 * True when at least one interval boundary (counted from ts_added) lies in
 * (last_regular_update, now]. Several crossed boundaries still count once.
 */
export function isDue(entity: Candidate, intervalMinutes: number, now: Date): boolean {
  const before = elapsedCount(entity.ts_added, entity.last_regular_update, intervalMinutes);
  const after = elapsedCount(entity.ts_added, now, intervalMinutes);
  return after > before;
}

/**
 * Snaps `now` down onto the entity's cadence grid, anchored at ts_added.
 */
export function quantizeToCadence(tsAdded: Date, now: Date, cadenceMinutes: number): Date {
  const step = cadenceMinutes * MINUTE_MS;
  const steps = Math.floor((now.getTime() - tsAdded.getTime()) / step);
  return new Date(tsAdded.getTime() + steps * step);
}

export interface EventDecision {
  readonly events: readonly string[];
  readonly last_regular_update: Date;
}

/**
 * Lists the periodic events that became due since the entity's last
 * regular update, followed by any supplemental events (checked on a
 * daily cadence), and computes the new last_regular_update.
 *
 * `supplemental` should already be restricted to the entity's type;
 * entries that have expired at `now` are ignored here regardless.
 * An event name is reported at most once: a supplemental entry whose name
 * matches an event already listed, or a repeated supplemental entry, adds
 * nothing.
 */
export function determineEvents(
  entity: Candidate,
  events: ReadonlyMap<string, number>,
  supplemental: readonly SupplementalEvent[],
  cadenceMinutes: number,
  now: Date,
): EventDecision {
  const fired: string[] = [];

  for (const [name, interval] of events) {
    if (isDue(entity, interval, now)) fired.push(name);
  }

  if (supplemental.length > 0 && isDue(entity, DAY_MINUTES, now)) {
    for (const entry of supplemental) {
      if (entry.expires_at.getTime() <= now.getTime()) continue;
      if (!fired.includes(entry.event_name)) fired.push(entry.event_name);
    }
  }

  return {
    events: fired,
    last_regular_update: quantizeToCadence(entity.ts_added, now, cadenceMinutes),
  };
}
