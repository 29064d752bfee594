import { Router } from 'express';
import type { DateRange } from '../repositories/types';
import type { ReadingIngest } from '../services/ingestion/readingIngest';
import { type ValidationResult, parseId, parseTimestamp, unwrap } from '../validation/common';
import { validateNewInverter } from '../validation/inverters';
import { parseReadingsCsv, validateReadingsPayload } from '../validation/readings';
import { asyncHandler } from './asyncHandler';

function parseRange(query: Record<string, unknown>): ValidationResult<DateRange> {
  const issues: string[] = [];
  const range: DateRange = {};
  for (const field of ['start', 'end'] as const) {
    const raw = query[field];
    if (raw === undefined || raw === '') continue;
    const ts = parseTimestamp(raw);
    if (!ts) {
      issues.push(`${field} must be an ISO-8601 timestamp`);
    } else {
      range[field] = ts;
    }
  }
  return issues.length ? { ok: false, issues } : { ok: true, value: range };
}

export function createInvertersRouter(ingest: ReadingIngest): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const input = unwrap(validateNewInverter(req.body), 'Invalid inverter');
      const inverter = await ingest.registerInverter(input);
      res.status(201).json(inverter);
    }),
  );

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(await ingest.listInverters());
    }),
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const id = unwrap(parseId(req.params.id, 'id'));
      res.json(await ingest.getInverter(id));
    }),
  );

  router.post(
    '/:id/readings',
    asyncHandler(async (req, res) => {
      const id = unwrap(parseId(req.params.id, 'id'));
      const readings = req.is('text/csv')
        ? unwrap(await parseReadingsCsv(typeof req.body === 'string' ? req.body : ''), 'Invalid CSV')
        : unwrap(validateReadingsPayload(req.body), 'Invalid readings');
      const result = await ingest.ingest(id, readings);
      res.status(201).json(result);
    }),
  );

  router.get(
    '/:id/readings',
    asyncHandler(async (req, res) => {
      const id = unwrap(parseId(req.params.id, 'id'));
      const range = unwrap(parseRange(req.query));
      res.json(await ingest.listReadings(id, range));
    }),
  );

  return router;
}
