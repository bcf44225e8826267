import pg from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { type PgDatabase } from 'drizzle-orm/pg-core';

/**
 * Anything a repository can run queries against: the pooled database or an
 * open transaction.
 */
export type DbClient = PgDatabase<NodePgQueryResultHKT>;

export interface Database {
  db: NodePgDatabase;
  close(): Promise<void>;
}

export function createDatabase(connectionString: string): Database {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool);
  return {
    db,
    close: () => pool.end(),
  };
}
