import { Pool, type PoolClient } from 'pg';
import config from './config';
import logger from './logger';
import { runMigrations } from './migrations';

export interface Queryable {
  query<T>(text: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

function createPool() {
  return new Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
  });
}

export const pool = createPool();

export async function initSchema(): Promise<void> {
  await runMigrations({ pool });
}

async function withTimeout<T>(work: Promise<T>, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out`)), config.db.queryTimeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function query<T>(text: string, params?: unknown[]): Promise<{ rows: T[] }> {
  try {
    const result = await withTimeout(pool.query(text, params), 'DB query');
    return { rows: result.rows };
  } catch (err) {
    logger.error({ err }, '[db] query failed');
    throw err;
  }
}

export const poolQueryable: Queryable = { query };

export function clientQueryable(client: PoolClient): Queryable {
  return {
    async query<T>(text: string, params?: unknown[]) {
      const result = await withTimeout(client.query(text, params), 'DB query');
      return { rows: result.rows };
    },
  };
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client; any throw rolls the
 * whole unit back before it is rethrown.
 */
export async function withTransaction<T>(fn: (db: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(clientQueryable(client));
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.error({ err: rollbackErr }, '[db] rollback failed');
    });
    throw err;
  } finally {
    client.release();
  }
}
