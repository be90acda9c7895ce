import { isIndefinite, type LeaseInterval } from './interval.js';
import type { LeaseMap } from './entity.js';

const MINUTE_MS = 60_000;

/**
 * Outcome of evaluating an entity's leases.
 *
 * `unknown` lists leases that were dropped because the current
 * configuration no longer names them; the caller reports these.
 * `leases === null` on a keep verdict means the stored mapping needs no rewrite.
 */
export type LeaseVerdict =
  | {
      readonly action: 'delete';
      readonly expired: readonly string[];
      readonly unknown: readonly string[];
    }
  | {
      readonly action: 'keep';
      readonly leases: LeaseMap | null;
      readonly expired: readonly string[];
      readonly unknown: readonly string[];
    };

/**
 * Decides keep-vs-delete for one entity.
 *
 * - No leases configured for the type: never deleted. Leases on the record
 *   are all unknown and get dropped; the mapping is rewritten only if
 *   there was something to drop.
 * - Otherwise the entity survives while at least one configured lease is
 *   indefinite or unexpired. Indefinite leases are renewed to `now` under
 *   their own name; unexpired ones carry forward unchanged; expired and
 *   unknown ones are dropped.
 *
 * Pure. The caller supplies `now`.
 */
export function evaluateLeases(
  current: LeaseMap,
  configured: ReadonlyMap<string, LeaseInterval>,
  now: Date,
): LeaseVerdict {
  const unknown: string[] = [];
  const expired: string[] = [];

  if (configured.size === 0) {
    unknown.push(...Object.keys(current));
    return {
      action: 'keep',
      leases: unknown.length > 0 ? {} : null,
      expired,
      unknown,
    };
  }

  let remove = true;
  const surviving: Record<string, Date> = {};

  for (const [name, createdAt] of Object.entries(current)) {
    const interval = configured.get(name);

    if (interval === undefined) {
      unknown.push(name);
      continue;
    }

    if (isIndefinite(interval)) {
      remove = false;
      surviving[name] = now;
      continue;
    }

    if (createdAt.getTime() + interval * MINUTE_MS > now.getTime()) {
      remove = false;
      surviving[name] = createdAt;
      continue;
    }

    expired.push(name);
  }

  if (remove) {
    return { action: 'delete', expired, unknown };
  }

  return { action: 'keep', leases: surviving, expired, unknown };
}
