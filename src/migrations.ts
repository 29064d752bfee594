import fs from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import logger from './logger';

type Direction = 'up' | 'down';

export interface MigrationClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

interface RunMigrationsOptions {
  direction?: Direction;
  to?: string | null;
  client?: MigrationClient;
  pool?: Pool;
  migrationsDir?: string;
}

interface MigrationFile {
  version: string;
  upPath: string;
  downPath: string;
}

function resolveMigrationsDir() {
  const srcPath = path.join(__dirname, '..', 'migrations');
  if (fs.existsSync(srcPath)) return srcPath;
  const distPath = path.join(__dirname, '..', '..', 'migrations');
  if (fs.existsSync(distPath)) return distPath;
  throw new Error('[migrations] migrations directory not found');
}

function loadMigrations(migrationsDir = resolveMigrationsDir()): MigrationFile[] {
  const entries = fs.readdirSync(migrationsDir);
  const migrationNames = entries
    .filter((f) => f.endsWith('.sql') && !f.endsWith('.down.sql'))
    .map((f) => f.replace(/\.sql$/, ''))
    .sort();

  return migrationNames.map((version) => ({
    version,
    upPath: path.join(migrationsDir, `${version}.sql`),
    downPath: path.join(migrationsDir, `${version}.down.sql`),
  }));
}

function versionOf(row: unknown): string | null {
  if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'string') {
    return row.version;
  }
  return null;
}

async function withClient<T>(
  options: RunMigrationsOptions,
  fn: (client: MigrationClient) => Promise<T>,
): Promise<T> {
  if (options.client) {
    return fn(options.client);
  }
  if (!options.pool) {
    throw new Error('[migrations] a client or pool is required');
  }

  const client = await options.pool.connect();
  try {
    return await fn({ query: (sql, params) => client.query(sql, params) });
  } finally {
    client.release();
  }
}

async function ensureMigrationsTable(client: MigrationClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

export async function getMigrationState(options: RunMigrationsOptions = {}) {
  const migrations = loadMigrations(options.migrationsDir);
  return withClient(options, async (client) => {
    await ensureMigrationsTable(client);
    const { rows } = await client.query('SELECT version FROM schema_migrations ORDER BY version');
    const applied = rows.map(versionOf).filter((v): v is string => v !== null);
    const appliedSet = new Set(applied);
    const pending = migrations.map((m) => m.version).filter((v) => !appliedSet.has(v));
    return { ok: pending.length === 0, applied, pending };
  });
}

export async function runMigrations(options: RunMigrationsOptions = {}): Promise<void> {
  const direction: Direction = options.direction ?? 'up';
  const to = options.to ?? null;
  const migrations = loadMigrations(options.migrationsDir);

  await withClient(options, async (client) => {
    await ensureMigrationsTable(client);

    if (direction === 'up') {
      for (const migration of migrations) {
        const applied = await client.query(
          'SELECT version FROM schema_migrations WHERE version = $1',
          [migration.version],
        );
        if (applied.rows.length > 0) continue;

        const sql = fs.readFileSync(migration.upPath, 'utf-8');
        await client.query('BEGIN');
        try {
          await client.query(sql);
          await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [migration.version]);
          await client.query('COMMIT');
        } catch (err) {
          await client.query('ROLLBACK');
          throw err;
        }
        logger.info('[migrations] applied', { migration: migration.version });
      }
      return;
    }

    // direction === 'down'
    const appliedMigrations = await client.query(
      'SELECT version FROM schema_migrations ORDER BY applied_at DESC, version DESC',
    );
    const appliedSet = new Set(appliedMigrations.rows.map(versionOf));

    const toRollback = migrations
      .filter((m) => appliedSet.has(m.version))
      .sort((a, b) => b.version.localeCompare(a.version));

    for (const migration of toRollback) {
      if (to && migration.version <= to) {
        break;
      }
      if (!fs.existsSync(migration.downPath)) {
        throw new Error(`[migrations] missing down script for ${migration.version}`);
      }
      const sql = fs.readFileSync(migration.downPath, 'utf-8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('DELETE FROM schema_migrations WHERE version = $1', [migration.version]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
      logger.warn('[migrations] rolled back', { migration: migration.version });

      if (!to) {
        // Default rollback only the latest migration
        break;
      }
    }
  });
}

if (require.main === module) {
  const direction: Direction = process.argv[2] === 'down' ? 'down' : 'up';
  import('./db')
    .then(async ({ pool }) => {
      try {
        await runMigrations({ pool, direction, to: process.argv[3] ?? null });
      } finally {
        await pool.end();
      }
    })
    .catch((err: unknown) => {
      logger.error({ err }, '[migrations] failed');
      process.exit(1);
    });
}
