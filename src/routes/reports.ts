import { Router } from 'express';
import { asyncHandler } from './asyncHandler';
import { ValidationError } from '../errors';
import type { FleetReports } from '../reports/fleetReport';
import type { IntegrityGuard } from '../state/integrityGuard';
import { type ValidationResult, isObject, parseId, unwrap } from '../validation/common';
import { parseStatusFilter } from '../validation/credits';

function optionalNonNegativeInt(raw: unknown, field: string, issues: string[]): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    issues.push(`${field} must be a non-negative integer`);
    return undefined;
  }
  return value;
}

function parseAuditQuery(query: Record<string, unknown>): ValidationResult<{ limit?: number; afterSequenceNo?: number }> {
  const issues: string[] = [];
  const limit = optionalNonNegativeInt(query.limit, 'limit', issues);
  const afterSequenceNo = optionalNonNegativeInt(query.after, 'after', issues);
  return issues.length ? { ok: false, issues } : { ok: true, value: { limit, afterSequenceNo } };
}

export function createReportsRouter(reports: FleetReports, integrity: IntegrityGuard): Router {
  const router = Router();

  router.get(
    '/fleet/summary',
    asyncHandler(async (_req, res) => {
      res.json(await reports.fleetSummary());
    }),
  );

  router.get(
    '/inverters/:id/audit',
    asyncHandler(async (req, res) => {
      const id = unwrap(parseId(req.params.id, 'id'));
      res.json(await reports.inverterAudit(id));
    }),
  );

  router.get(
    '/credits',
    asyncHandler(async (req, res) => {
      const status = unwrap(parseStatusFilter(req.query.status));
      res.json(await reports.creditsByStatus(status));
    }),
  );

  router.get(
    '/audit',
    asyncHandler(async (req, res) => {
      const options = unwrap(parseAuditQuery(req.query));
      res.json(await reports.auditEntries(options));
    }),
  );

  router.get(
    '/audit/verify',
    asyncHandler(async (_req, res) => {
      res.json(await reports.chainStatus());
    }),
  );

  router.post(
    '/audit/clear-halt',
    asyncHandler(async (req, res) => {
      const note = isObject(req.body) && typeof req.body.note === 'string' ? req.body.note.trim() : '';
      if (!note) {
        throw new ValidationError('Invalid request', ['note is required']);
      }
      integrity.clear(note);
      res.json(integrity.snapshot());
    }),
  );

  return router;
}
