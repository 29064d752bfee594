import logger from '../logger';
import { FLEET_DEFAULTS } from '../services/ingestion/fleetImport';
import { ReadingIngest } from '../services/ingestion/readingIngest';
import type { NewReading } from '../types/dmrv';
import { toIsoDate, utcDayRange } from '../utils/dates';

const DAY_MS = 24 * 60 * 60 * 1000;
const FIRST_HOUR = 8;
const LAST_HOUR = 18;
const EFFICIENCY = 0.8;

/** Hourly readings shaped like a clear day peaking at 13:00 UTC, for `days` days ending on `endDate`. */
export function buildSeedReadings(capacityKw: number, endDate: string, days = 7): NewReading[] {
  const readings: NewReading[] = [];
  const lastDay = utcDayRange(endDate).start.getTime();
  for (let back = days - 1; back >= 0; back -= 1) {
    const dayStart = lastDay - back * DAY_MS;
    for (let hour = FIRST_HOUR; hour <= LAST_HOUR; hour += 1) {
      const shape = 1 - Math.abs(hour - 13) / 5;
      const kwh = Math.round(capacityKw * shape * EFFICIENCY * 1000) / 1000;
      readings.push({ timestamp: new Date(dayStart + hour * 60 * 60 * 1000), kwh });
    }
  }
  return readings;
}

async function main(): Promise<void> {
  const { initSchema, pool } = await import('../db');
  const { createPgStore } = await import('../repositories/pgStore');
  try {
    await initSchema();
    const ingest = new ReadingIngest(createPgStore());
    const inverter = await ingest.registerInverter(FLEET_DEFAULTS);
    const result = await ingest.ingest(
      inverter.id,
      buildSeedReadings(inverter.capacityKw, toIsoDate(new Date())),
    );
    logger.info('[seed] sample data created', { inverterId: inverter.id, readings: result.inserted });
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error({ err }, '[seed] failed');
    process.exit(1);
  });
}
