import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the `db` instance (for queries). postgres.js connects lazily,
 * so building a client never blocks destination setup.
 */
export function createDbClient(databaseUrl: string, options: { max?: number } = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

  const db = drizzle(sql);

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
