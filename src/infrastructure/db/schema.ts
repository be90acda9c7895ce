import { pgTable, varchar, timestamp, jsonb, index, primaryKey } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `entities` table.
 *
 * One row per tracked entity, keyed by `(entity_type, entity_key)`.
 * `leases` maps lease name → ISO-8601 creation time.
 * The updater only reads this table; writes arrive through queued tasks,
 * except for `registerEntity`, which stamps new rows.
 */
export const entities = pgTable('entities', {
  entity_type: varchar('entity_type', { length: 64 }).notNull(),
  entity_key: varchar('entity_key', { length: 255 }).notNull(),
  ts_added: timestamp('ts_added', { withTimezone: true }).notNull(),
  last_regular_update: timestamp('last_regular_update', { withTimezone: true }).notNull(),
  leases: jsonb('leases').$type<Record<string, string>>().notNull().default({}),
}, (table) => [
  primaryKey({ columns: [table.entity_type, table.entity_key] }),
  index('idx_entities_type_lru').on(table.entity_type, table.last_regular_update),
]);

/** DDL applied at startup when the table is missing. Mirrors `entities` above. */
export const ENTITIES_DDL = [
  `CREATE TABLE IF NOT EXISTS entities (
    entity_type          VARCHAR(64)  NOT NULL,
    entity_key           VARCHAR(255) NOT NULL,
    ts_added             TIMESTAMPTZ  NOT NULL,
    last_regular_update  TIMESTAMPTZ  NOT NULL,
    leases               JSONB        NOT NULL DEFAULT '{}',
    PRIMARY KEY (entity_type, entity_key)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_entities_type_lru ON entities (entity_type, last_regular_update)`,
];
