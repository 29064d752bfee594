import { type Queryable, poolQueryable } from '../db';
import type { IrradianceDay, IrradianceSample } from '../types/dmrv';
import type { IrradianceCacheRepository } from './types';

interface StoredSample {
  timestamp: string;
  allskyIrradiance: number;
}

function isStoredSample(value: unknown): value is StoredSample {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    typeof value.timestamp === 'string' &&
    'allskyIrradiance' in value &&
    typeof value.allskyIrradiance === 'number'
  );
}

function toSamples(raw: unknown, lat: number, lon: number, date: string): IrradianceSample[] {
  if (!Array.isArray(raw)) {
    throw new Error(`Cached irradiance for ${lat},${lon} ${date} is not an array`);
  }
  return raw.filter(isStoredSample).map((s) => ({
    lat,
    lon,
    date,
    timestamp: new Date(s.timestamp),
    allskyIrradiance: s.allskyIrradiance,
  }));
}

export async function getCachedIrradiance(
  latKey: number,
  lonKey: number,
  date: string,
  db: Queryable = poolQueryable,
): Promise<IrradianceDay | null> {
  const { rows } = await db.query<{ samples: unknown }>(
    `SELECT samples FROM irradiance_cache WHERE lat_key = $1 AND lon_key = $2 AND day = $3::date LIMIT 1;`,
    [latKey, lonKey, date],
  );
  if (!rows[0]) return null;
  return { lat: latKey, lon: lonKey, date, samples: toSamples(rows[0].samples, latKey, lonKey, date) };
}

export async function saveCachedIrradiance(
  latKey: number,
  lonKey: number,
  day: IrradianceDay,
  db: Queryable = poolQueryable,
): Promise<void> {
  const stored: StoredSample[] = day.samples.map((s) => ({
    timestamp: s.timestamp.toISOString(),
    allskyIrradiance: s.allskyIrradiance,
  }));
  await db.query(
    `
    INSERT INTO irradiance_cache (lat_key, lon_key, day, samples)
    VALUES ($1, $2, $3::date, $4::jsonb)
    ON CONFLICT ON CONSTRAINT irradiance_cache_pkey DO UPDATE SET
      samples = EXCLUDED.samples,
      fetched_at = NOW();
  `,
    [latKey, lonKey, day.date, JSON.stringify(stored)],
  );
}

export function irradianceCacheRepository(db: Queryable = poolQueryable): IrradianceCacheRepository {
  return {
    get: (latKey, lonKey, date) => getCachedIrradiance(latKey, lonKey, date, db),
    put: (latKey, lonKey, day) => saveCachedIrradiance(latKey, lonKey, day, db),
  };
}
