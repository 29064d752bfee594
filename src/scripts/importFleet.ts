import { readFile } from 'node:fs/promises';
import logger from '../logger';
import { importFleet, parseFleetCsv } from '../services/ingestion/fleetImport';
import { ReadingIngest } from '../services/ingestion/readingIngest';
import { unwrap } from '../validation/common';

export interface ImportArgs {
  file: string;
  limit?: number;
}

/** `<file> [--limit N]` */
export function parseImportArgs(argv: string[]): ImportArgs {
  let file: string | undefined;
  let limit: number | undefined;
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--limit') {
      const value = Number(argv[i + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error('--limit must be a positive integer');
      }
      limit = value;
      i += 1;
    } else if (!file) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }
  if (!file) {
    throw new Error('Usage: import-fleet <file.csv> [--limit N]');
  }
  return { file, limit };
}

async function main(argv: string[]): Promise<void> {
  const { file, limit } = parseImportArgs(argv);
  const parsed = unwrap(await parseFleetCsv(await readFile(file, 'utf8')), 'Invalid fleet CSV');
  for (const issue of parsed.skipped) {
    logger.warn('[fleet-import] row skipped', { issue });
  }

  const { initSchema, pool } = await import('../db');
  const { createPgStore } = await import('../repositories/pgStore');
  try {
    await initSchema();
    const summary = await importFleet(new ReadingIngest(createPgStore()), parsed.inverters, { limit });
    logger.info('[fleet-import] done', {
      inverters: parsed.inverters.length,
      imported: summary.imported.length,
      failed: summary.failed.length,
      skippedRows: parsed.skipped.length,
    });
    if (!summary.imported.length) process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    logger.error({ err }, '[fleet-import] failed');
    process.exit(1);
  });
}
