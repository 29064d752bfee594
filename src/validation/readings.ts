import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import type { NewReading } from '../types/dmrv';
import { type ValidationResult, type Validator, isObject, parseTimestamp } from './common';

const CSV_COLUMNS = ['timestamp', 'kwh'] as const;

function validateReading(raw: unknown, label: string, issues: string[]): NewReading | null {
  if (!isObject(raw)) {
    issues.push(`${label} must be an object`);
    return null;
  }
  const timestamp = parseTimestamp(raw.timestamp);
  if (!timestamp) {
    issues.push(`${label}: timestamp must be an ISO-8601 timestamp`);
  }
  const kwhRaw = typeof raw.kwh === 'string' && raw.kwh.trim() !== '' ? Number(raw.kwh) : raw.kwh;
  const kwh = typeof kwhRaw === 'number' && Number.isFinite(kwhRaw) ? kwhRaw : null;
  if (kwh === null || kwh < 0) {
    issues.push(`${label}: kwh must be a finite number >= 0`);
  }
  return timestamp && kwh !== null && kwh >= 0 ? { timestamp, kwh } : null;
}

function checkBatch(readings: NewReading[], issues: string[]): ValidationResult<NewReading[]> {
  const seen = new Set<number>();
  for (const reading of readings) {
    const ms = reading.timestamp.getTime();
    if (seen.has(ms)) {
      issues.push(`timestamp ${reading.timestamp.toISOString()} appears more than once in the batch`);
    }
    seen.add(ms);
  }
  if (!readings.length && !issues.length) {
    issues.push('at least one reading is required');
  }
  return issues.length ? { ok: false, issues } : { ok: true, value: readings };
}

/** `{ readings: [{ timestamp, kwh }] }` */
export const validateReadingsPayload: Validator<NewReading[]> = (payload) => {
  if (!isObject(payload) || !Array.isArray(payload.readings)) {
    return { ok: false, issues: ['readings must be an array'] };
  }
  const issues: string[] = [];
  const readings: NewReading[] = [];
  payload.readings.forEach((raw: unknown, index: number) => {
    const reading = validateReading(raw, `readings[${index}]`, issues);
    if (reading) readings.push(reading);
  });
  return checkBatch(readings, issues);
};

/**
 * Parse a `timestamp,kwh` CSV body. Issues name the data row (1-based, header
 * excluded).
 */
export async function parseReadingsCsv(text: string): Promise<ValidationResult<NewReading[]>> {
  const issues: string[] = [];
  const readings: NewReading[] = [];
  let headerChecked = false;

  const stream = Readable.from([text]).pipe(
    csvParser({
      separator: ',',
      mapHeaders: ({ header }) => header.trim().toLowerCase(),
      strict: true,
    }),
  );

  let row = 0;
  try {
    for await (const record of stream) {
      row += 1;
      if (!isObject(record)) continue;
      if (!headerChecked) {
        headerChecked = true;
        const missing = CSV_COLUMNS.filter((column) => !(column in record));
        if (missing.length) {
          return { ok: false, issues: [`CSV header must include ${CSV_COLUMNS.join(',')}`] };
        }
      }
      const reading = validateReading(record, `row ${row}`, issues);
      if (reading) readings.push(reading);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, issues: [`row ${row + 1}: ${message}`] };
  }

  return checkBatch(readings, issues);
}
