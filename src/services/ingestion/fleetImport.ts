import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import logger from '../../logger';
import type { NewReading } from '../../types/dmrv';
import { type ValidationResult, isObject, parseTimestamp } from '../../validation/common';
import type { ReadingIngest } from './readingIngest';

const REQUIRED_COLUMNS = ['inverter_id', 'timestamp', 'kw_generated'] as const;

/** Used when a fleet export has no usable GPS_Location or Max_kW_Capacity for an inverter. */
export const FLEET_DEFAULTS = { gpsLat: 6.5244, gpsLon: 3.3792, capacityKw: 10 };

export interface FleetInverter {
  externalId: string;
  gpsLat: number;
  gpsLon: number;
  capacityKw: number;
  readings: NewReading[];
}

export interface ParsedFleet {
  inverters: FleetInverter[];
  /** `row N: …` for each data row left out. */
  skipped: string[];
}

interface Draft {
  site: { gpsLat: number; gpsLon: number } | null;
  capacityKw: number | null;
  readings: NewReading[];
  seen: Set<number>;
}

function cell(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  return typeof value === 'string' ? value.trim() : '';
}

function parseSite(text: string): { gpsLat: number; gpsLon: number } | null {
  const parts = text.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 2 || !parts.every(Number.isFinite)) return null;
  const [gpsLat, gpsLon] = parts;
  if (gpsLat < -90 || gpsLat > 90 || gpsLon < -180 || gpsLon > 180) return null;
  return { gpsLat, gpsLon };
}

function parseCapacity(text: string): number | null {
  const value = text === '' ? NaN : Number(text);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * Split a multi-inverter fleet export (`Inverter_ID, Timestamp, GPS_Location,
 * Max_kW_Capacity, kW_Generated, …`) into one reading batch per inverter. Bad
 * rows are skipped and reported; the first usable site and capacity per
 * inverter win.
 */
export async function parseFleetCsv(text: string): Promise<ValidationResult<ParsedFleet>> {
  const drafts = new Map<string, Draft>();
  const skipped: string[] = [];

  const stream = Readable.from([text]).pipe(
    csvParser({ mapHeaders: ({ header }) => header.trim().toLowerCase() }),
  );

  let row = 0;
  for await (const record of stream) {
    row += 1;
    if (!isObject(record)) continue;
    if (row === 1) {
      const missing = REQUIRED_COLUMNS.filter((column) => !(column in record));
      if (missing.length) {
        return { ok: false, issues: [`fleet CSV is missing columns: ${missing.join(', ')}`] };
      }
    }

    const externalId = cell(record, 'inverter_id');
    if (!externalId) {
      skipped.push(`row ${row}: Inverter_ID is required`);
      continue;
    }
    const timestamp = parseTimestamp(cell(record, 'timestamp'));
    if (!timestamp) {
      skipped.push(`row ${row}: Timestamp must be an ISO-8601 timestamp`);
      continue;
    }
    const kwhText = cell(record, 'kw_generated');
    const kwh = kwhText === '' ? NaN : Number(kwhText);
    if (!Number.isFinite(kwh) || kwh < 0) {
      skipped.push(`row ${row}: kW_Generated must be a finite number >= 0`);
      continue;
    }

    const draft: Draft = drafts.get(externalId) ?? {
      site: null,
      capacityKw: null,
      readings: [],
      seen: new Set<number>(),
    };
    drafts.set(externalId, draft);
    if (draft.seen.has(timestamp.getTime())) {
      skipped.push(`row ${row}: timestamp ${timestamp.toISOString()} repeats for ${externalId}`);
      continue;
    }
    draft.seen.add(timestamp.getTime());
    draft.readings.push({ timestamp, kwh });
    draft.site ??= parseSite(cell(record, 'gps_location'));
    draft.capacityKw ??= parseCapacity(cell(record, 'max_kw_capacity'));
  }

  const inverters = [...drafts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([externalId, draft]) => ({
      externalId,
      gpsLat: draft.site?.gpsLat ?? FLEET_DEFAULTS.gpsLat,
      gpsLon: draft.site?.gpsLon ?? FLEET_DEFAULTS.gpsLon,
      capacityKw: draft.capacityKw ?? FLEET_DEFAULTS.capacityKw,
      readings: draft.readings,
    }));

  return { ok: true, value: { inverters, skipped } };
}

export interface FleetImportSummary {
  imported: Array<{ externalId: string; inverterId: number; inserted: number }>;
  failed: Array<{ externalId: string; reason: string }>;
}

/** Registers each fleet inverter and stores its readings; one inverter failing does not stop the rest. */
export async function importFleet(
  ingest: ReadingIngest,
  inverters: FleetInverter[],
  options: { limit?: number } = {},
): Promise<FleetImportSummary> {
  const summary: FleetImportSummary = { imported: [], failed: [] };
  const selected = options.limit === undefined ? inverters : inverters.slice(0, options.limit);

  for (const { externalId, readings, ...site } of selected) {
    try {
      const inverter = await ingest.registerInverter(site);
      const result = await ingest.ingest(inverter.id, readings);
      summary.imported.push({ externalId, inverterId: inverter.id, inserted: result.inserted });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn('[fleet-import] inverter import failed', { externalId, err });
      summary.failed.push({ externalId, reason });
    }
  }
  return summary;
}
