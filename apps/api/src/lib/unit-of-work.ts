import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { type DbClient } from './db.js';

/**
 * Runs `work` inside one database transaction with repositories bound to it.
 * A rejected `work` rolls everything back.
 */
export interface TransactionRunner<TRepos> {
  run<T>(work: (repos: TRepos) => Promise<T>): Promise<T>;
}

export function createTransactionRunner<TRepos>(
  db: NodePgDatabase,
  makeRepos: (client: DbClient) => TRepos,
): TransactionRunner<TRepos> {
  return {
    run(work) {
      return db.transaction((tx) => work(makeRepos(tx)));
    },
  };
}
