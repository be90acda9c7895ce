import { and, eq, gt, lte } from 'drizzle-orm';
import type { Logger } from 'pino';
import type { EntityStore } from '../../application/ports.js';
import type { Candidate, LeaseMap } from '../../domain/index.js';
import type { Database } from './client.js';
import { entities } from './schema.js';

/** Row shape returned by entity queries. */
export type EntityRow = typeof entities.$inferSelect;

/**
 * Entities of `entityType` whose last_regular_update is in (after, before].
 * Served by `idx_entities_type_lru`.
 */
export async function fetchDueEntities(
  db: Database,
  entityType: string,
  before: Date,
  after: Date,
): Promise<Candidate[]> {
  const rows = await db
    .select({
      entity_key: entities.entity_key,
      last_regular_update: entities.last_regular_update,
      ts_added: entities.ts_added,
    })
    .from(entities)
    .where(and(
      eq(entities.entity_type, entityType),
      gt(entities.last_regular_update, after),
      lte(entities.last_regular_update, before),
    ));

  return rows;
}

/**
 * Converts the stored lease mapping into Dates.
 * Entries with an unparseable timestamp are reported through `onInvalid` and left out.
 */
export function parseStoredLeases(
  stored: Readonly<Record<string, unknown>>,
  onInvalid: (lease: string, value: unknown) => void,
): LeaseMap {
  const leases: Record<string, Date> = {};
  for (const [name, value] of Object.entries(stored)) {
    const createdAt = typeof value === 'string' ? new Date(value) : null;
    if (createdAt === null || Number.isNaN(createdAt.getTime())) {
      onInvalid(name, value);
      continue;
    }
    leases[name] = createdAt;
  }
  return leases;
}

export async function findEntityLeases(
  db: Database,
  log: Logger,
  entityType: string,
  entityKey: string,
): Promise<LeaseMap> {
  const rows = await db
    .select({ leases: entities.leases })
    .from(entities)
    .where(and(eq(entities.entity_type, entityType), eq(entities.entity_key, entityKey)))
    .limit(1);

  const stored = rows[0]?.leases ?? {};
  return parseStoredLeases(stored, (lease, value) => {
    log.warn({ entity_type: entityType, entity_key: entityKey, lease, value }, 'Invalid lease timestamp ignored');
  });
}

/**
 * Inserts a newly seen entity, stamped with `ts_added = last_regular_update = now`.
 *
 * Idempotent: ON CONFLICT DO NOTHING on the primary key.
 * Returns true if a row was inserted, false if the entity already existed.
 */
export async function registerEntity(
  db: Database,
  entityType: string,
  entityKey: string,
  now: Date,
  leases: Readonly<Record<string, Date>> = {},
): Promise<boolean> {
  const stored: Record<string, string> = {};
  for (const [name, createdAt] of Object.entries(leases)) {
    stored[name] = createdAt.toISOString();
  }

  const result = await db
    .insert(entities)
    .values({
      entity_type: entityType,
      entity_key: entityKey,
      ts_added: now,
      last_regular_update: now,
      leases: stored,
    })
    .onConflictDoNothing({ target: [entities.entity_type, entities.entity_key] });

  return result.count > 0;
}

/** Adapts the repository functions to the updater's EntityStore port. */
export function createEntityStore(db: Database, log: Logger): EntityStore {
  return {
    fetchDue: (entityType, before, after) => fetchDueEntities(db, entityType, before, after),
    getLeases: (entityType, entityKey) => findEntityLeases(db, log, entityType, entityKey),
  };
}
