import { type Queryable, poolQueryable, withTransaction } from '../db';
import { auditRepository } from './auditRepo';
import { creditRepository } from './creditsRepo';
import { inverterRepository } from './invertersRepo';
import { irradianceCacheRepository } from './irradianceCacheRepo';
import { readingRepository } from './readingsRepo';
import type { Repositories, Store } from './types';

function repositoriesFor(db: Queryable): Repositories {
  return {
    inverters: inverterRepository(db),
    readings: readingRepository(db),
    credits: creditRepository(db),
    audit: auditRepository(db),
  };
}

/**
 * Postgres-backed store. `withTransaction` takes a transaction-scoped
 * advisory lock on the key so other processes serialize on it too.
 */
export function createPgStore(db: Queryable = poolQueryable): Store {
  return {
    ...repositoriesFor(db),
    irradianceCache: irradianceCacheRepository(db),
    withTransaction: (lockKey, work) =>
      withTransaction(async (tx) => {
        await tx.query(`SELECT pg_advisory_xact_lock(hashtext($1));`, [lockKey]);
        return work(repositoriesFor(tx));
      }),
  };
}
