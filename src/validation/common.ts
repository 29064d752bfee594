import { ValidationError } from '../errors';

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };
export type Validator<T> = (payload: unknown) => ValidationResult<T>;

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the value, or throws a ValidationError carrying every issue. */
export function unwrap<T>(result: ValidationResult<T>, message = 'Invalid request'): T {
  if (!result.ok) {
    throw new ValidationError(message, result.issues);
  }
  return result.value;
}

export function parseId(raw: unknown, field: string): ValidationResult<number> {
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    return { ok: false, issues: [`${field} must be a positive integer`] };
  }
  return { ok: true, value };
}

const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/** ISO-8601 timestamp; one without a zone designator is read as UTC. */
export function parseTimestamp(raw: unknown): Date | null {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? null : raw;
  }
  if (typeof raw !== 'string') return null;
  const text = raw.trim();
  if (!/^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?/.test(text)) return null;
  const withZone = text.length > 10 && !ZONE_SUFFIX.test(text) ? `${text}Z` : text;
  const ts = new Date(withZone.replace(' ', 'T'));
  return Number.isNaN(ts.getTime()) ? null : ts;
}
