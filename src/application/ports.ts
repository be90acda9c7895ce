import type { Candidate, DispatchItem, LeaseMap, SupplementalEvent } from '../domain/index.js';

/**
 * Read side of the attribute-history datastore, as the updater sees it.
 */
export interface EntityStore {
  /** Entities of `entityType` whose last_regular_update lies in (after, before]. */
  fetchDue(entityType: string, before: Date, after: Date): Promise<Candidate[]>;
  getLeases(entityType: string, entityKey: string): Promise<LeaseMap>;
}

/** Producer side of the task queue. */
export interface TaskProducer {
  send(item: DispatchItem): Promise<void>;
}

/** Source of ad-hoc events, re-read every cycle. */
export interface SupplementalEventSource {
  read(entityTypes: readonly string[], now: Date): Promise<SupplementalEvent[]>;
}
