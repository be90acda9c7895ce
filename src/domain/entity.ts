/**
 * Core types for tracked entities and the work items produced for them.
 *
 * Field names follow the task wire format so items can be handed to
 * the queue producer without renaming.
 */

/** Lease name → creation time. */
export type LeaseMap = Readonly<Record<string, Date>>;

/** One row returned by the candidate fetch. */
export interface Candidate {
  readonly entity_key: string;
  readonly last_regular_update: Date;
  readonly ts_added: Date;
}

/** Lease mapping in its stored form (lease name → ISO-8601). */
export type StoredLeases = Readonly<Record<string, string>>;

export type AttributeValue = string | StoredLeases;

export interface AttributeUpdate {
  readonly op: 'set';
  readonly attribute: string;
  readonly value: AttributeValue;
}

/**
 * Unit of work handed to the queue. Terminal once enqueued.
 *
 * A delete item carries no events and no attribute updates.
 */
export interface DispatchItem {
  readonly entity_type: string;
  readonly entity_key: string;
  readonly events: readonly string[];
  readonly attribute_updates: readonly AttributeUpdate[];
  readonly delete: boolean;
}

/** Ad-hoc event read from the side-channel file. Lives for one cycle. */
export interface SupplementalEvent {
  readonly entity_type: string;
  readonly event_name: string;
  readonly expires_at: Date;
}

/** Attribute names written back through dispatch items. */
export const LEASES_ATTRIBUTE = 'leases';
export const LAST_REGULAR_UPDATE_ATTRIBUTE = 'last_regular_update';

export function toStoredLeases(leases: LeaseMap): StoredLeases {
  const stored: Record<string, string> = {};
  for (const [name, createdAt] of Object.entries(leases)) {
    stored[name] = createdAt.toISOString();
  }
  return stored;
}
