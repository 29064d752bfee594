import type { NewInverter } from '../types/dmrv';
import { type Validator, isObject } from './common';

function finiteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export const validateNewInverter: Validator<NewInverter> = (payload) => {
  if (!isObject(payload)) {
    return { ok: false, issues: ['body must be an object'] };
  }
  const issues: string[] = [];

  const gpsLat = finiteNumber(payload.gpsLat);
  if (gpsLat === null || gpsLat < -90 || gpsLat > 90) {
    issues.push('gpsLat must be a number between -90 and 90');
  }
  const gpsLon = finiteNumber(payload.gpsLon);
  if (gpsLon === null || gpsLon < -180 || gpsLon > 180) {
    issues.push('gpsLon must be a number between -180 and 180');
  }
  const capacityKw = finiteNumber(payload.capacityKw);
  if (capacityKw === null || capacityKw <= 0) {
    issues.push('capacityKw must be a positive number');
  }

  if (issues.length || gpsLat === null || gpsLon === null || capacityKw === null) {
    return { ok: false, issues };
  }
  return { ok: true, value: { gpsLat, gpsLon, capacityKw } };
};
