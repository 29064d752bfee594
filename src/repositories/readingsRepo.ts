import { type Queryable, poolQueryable } from '../db';
import { DuplicateReadingError } from '../errors';
import type { NewReading, Reading } from '../types/dmrv';
import type { DateRange, ReadingRepository } from './types';

interface ReadingRow {
  inverterId: number;
  timestamp: Date;
  kwh: number;
}

const UNIQUE_VIOLATION = '23505';

function toReading(row: ReadingRow): Reading {
  return {
    inverterId: Number(row.inverterId),
    timestamp: new Date(row.timestamp),
    kwh: Number(row.kwh),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

async function findExistingTimestamps(
  inverterId: number,
  timestamps: Date[],
  db: Queryable,
): Promise<string[]> {
  const { rows } = await db.query<{ ts: Date }>(
    `SELECT ts FROM readings WHERE inverter_id = $1 AND ts = ANY($2::timestamptz[]) ORDER BY ts;`,
    [inverterId, timestamps.map((t) => t.toISOString())],
  );
  return rows.map((r) => new Date(r.ts).toISOString());
}

/**
 * Inserts the whole batch in one statement. Any timestamp already stored for
 * the inverter rejects the batch.
 */
export async function insertReadings(
  inverterId: number,
  readings: NewReading[],
  db: Queryable = poolQueryable,
): Promise<Reading[]> {
  if (!readings.length) return [];
  const timestamps = readings.map((r) => r.timestamp);

  const existing = await findExistingTimestamps(inverterId, timestamps, db);
  if (existing.length) {
    throw new DuplicateReadingError(inverterId, existing);
  }

  try {
    const { rows } = await db.query<ReadingRow>(
      `
      INSERT INTO readings (inverter_id, ts, kwh)
      SELECT $1, t.ts, t.kwh
      FROM UNNEST($2::timestamptz[], $3::double precision[]) AS t(ts, kwh)
      RETURNING inverter_id AS "inverterId", ts AS "timestamp", kwh;
    `,
      [inverterId, timestamps.map((t) => t.toISOString()), readings.map((r) => r.kwh)],
    );
    return rows.map(toReading).sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  } catch (err) {
    if (isUniqueViolation(err)) {
      const raced = await findExistingTimestamps(inverterId, timestamps, db);
      throw new DuplicateReadingError(inverterId, raced);
    }
    throw err;
  }
}

export async function getReadingsForInverter(
  inverterId: number,
  range: DateRange = {},
  db: Queryable = poolQueryable,
): Promise<Reading[]> {
  const { rows } = await db.query<ReadingRow>(
    `
    SELECT inverter_id AS "inverterId", ts AS "timestamp", kwh
    FROM readings
    WHERE inverter_id = $1
      AND ($2::timestamptz IS NULL OR ts >= $2)
      AND ($3::timestamptz IS NULL OR ts < $3)
    ORDER BY ts ASC;
  `,
    [inverterId, range.start?.toISOString() ?? null, range.end?.toISOString() ?? null],
  );
  return rows.map(toReading);
}

export async function summarizeReadings(
  inverterId: number,
  db: Queryable = poolQueryable,
): Promise<{ count: number; totalKwh: number }> {
  const { rows } = await db.query<{ count: string; total: number | null }>(
    `SELECT COUNT(*) AS count, SUM(kwh) AS total FROM readings WHERE inverter_id = $1;`,
    [inverterId],
  );
  return { count: Number(rows[0]?.count ?? 0), totalKwh: Number(rows[0]?.total ?? 0) };
}

export async function getRecentReadings(
  inverterId: number,
  limit: number,
  db: Queryable = poolQueryable,
): Promise<Reading[]> {
  const { rows } = await db.query<ReadingRow>(
    `
    SELECT inverter_id AS "inverterId", ts AS "timestamp", kwh
    FROM readings
    WHERE inverter_id = $1
    ORDER BY ts DESC
    LIMIT $2;
  `,
    [inverterId, limit],
  );
  return rows.map(toReading);
}

export function readingRepository(db: Queryable = poolQueryable): ReadingRepository {
  return {
    insertMany: (inverterId, readings) => insertReadings(inverterId, readings, db),
    listForInverter: (inverterId, range) => getReadingsForInverter(inverterId, range, db),
    summarize: (inverterId) => summarizeReadings(inverterId, db),
    listRecent: (inverterId, limit) => getRecentReadings(inverterId, limit, db),
  };
}
