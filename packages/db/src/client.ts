import pg from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema/index.js';

export type Database = NodePgDatabase<typeof schema>;
export type DbTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];
/** Common base of `Database` and `DbTransaction`, for query builders that run on either. */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
  db: Database;
  /** Drain the pool; call once on shutdown. */
  close: () => Promise<void>;
}

export interface CreateDatabaseOptions {
  connectionString: string;
  /** Pool size (default: 10) */
  max?: number;
}

/**
 * Open a pooled connection to Postgres.
 *
 * @example
 * ```ts
 * const { db, close } = createDatabase({ connectionString: config.DATABASE_URL });
 * ```
 */
export function createDatabase(opts: CreateDatabaseOptions): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString: opts.connectionString,
    max: opts.max ?? 10,
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}
