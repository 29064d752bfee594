import { CREDIT_STATUSES, type CreditKey, type CreditStatus, isCreditStatus } from '../types/dmrv';
import { isIsoDate } from '../utils/dates';
import { type ValidationResult, type Validator, isObject, parseId } from './common';

export function parseCreditKey(inverterIdRaw: unknown, dateRaw: unknown): ValidationResult<CreditKey> {
  const issues: string[] = [];
  const inverterId = parseId(inverterIdRaw, 'inverterId');
  if (!inverterId.ok) issues.push(...inverterId.issues);
  const date = typeof dateRaw === 'string' ? dateRaw.trim() : '';
  if (!isIsoDate(date)) {
    issues.push('date must be a YYYY-MM-DD calendar date');
  }
  if (!inverterId.ok || issues.length) {
    return { ok: false, issues };
  }
  return { ok: true, value: { inverterId: inverterId.value, date } };
}

export const validateCalculateRequest: Validator<CreditKey> = (payload) => {
  if (!isObject(payload)) {
    return { ok: false, issues: ['body must be an object'] };
  }
  return parseCreditKey(payload.inverterId, payload.date);
};

export interface StatusUpdateRequest {
  status: CreditStatus;
  note?: string;
}

export const validateStatusUpdate: Validator<StatusUpdateRequest> = (payload) => {
  if (!isObject(payload)) {
    return { ok: false, issues: ['body must be an object'] };
  }
  const issues: string[] = [];
  const status = typeof payload.status === 'string' ? payload.status.trim().toUpperCase() : '';
  if (!isCreditStatus(status)) {
    issues.push(`status must be one of ${CREDIT_STATUSES.join(', ')}`);
  }
  let note: string | undefined;
  if (payload.note !== undefined && payload.note !== null) {
    if (typeof payload.note !== 'string') {
      issues.push('note must be a string');
    } else if (payload.note.trim()) {
      note = payload.note.trim();
    }
  }
  if (issues.length || !isCreditStatus(status)) {
    return { ok: false, issues };
  }
  return { ok: true, value: note === undefined ? { status } : { status, note } };
};

export function parseStatusFilter(raw: unknown): ValidationResult<CreditStatus | undefined> {
  if (raw === undefined || raw === '') return { ok: true, value: undefined };
  const status = typeof raw === 'string' ? raw.trim().toUpperCase() : '';
  if (!isCreditStatus(status)) {
    return { ok: false, issues: [`status must be one of ${CREDIT_STATUSES.join(', ')}`] };
  }
  return { ok: true, value: status };
}
