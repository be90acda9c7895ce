import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    // Sequential cycles: a couple of connections are plenty
    max: 4,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];

/**
 * Verifies the datastore is reachable and the `entities` table exists.
 * Throws on any failure; callers treat that as fatal at startup.
 */
export async function prepareDatastore(sql: Sql, ddl: readonly string[]): Promise<void> {
  await sql`select 1`;
  for (const statement of ddl) {
    await sql.unsafe(statement);
  }
}
