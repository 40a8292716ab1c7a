import { drizzle, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
  /** Seconds an idle connection stays open */
  idleTimeout?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, close } = createDatabase({
 *   connectionString: process.env.DATABASE_URL
 * });
 * const repos = createTransactionalPgRepositoryContext(db);
 * // ...
 * await close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    idle_timeout: config.idleTimeout,
  });

  const db = drizzle(client, { schema });

  return {
    db,
    client,
    close: () => client.end(),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * A database handle or a transaction opened on one.
 * Repositories accept either, so the same classes serve both.
 */
export type DatabaseExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
