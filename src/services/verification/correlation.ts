import { InsufficientSamplesError } from '../../errors';
import type { CurvePoint, Reading } from '../../types/dmrv';

const HOUR_MS = 60 * 60 * 1000;

export interface AlignedCurves {
  timestamps: Date[];
  actual: number[];
  theoretical: number[];
}

function hourBucket(ts: Date): number {
  return Math.floor(ts.getTime() / HOUR_MS);
}

/**
 * Pair irregular readings with the hourly theoretical curve. Readings are summed
 * per UTC hour; hours without any reading are left out of both series.
 */
export function alignCurves(
  readings: Reading[],
  theoretical: CurvePoint[],
  minPoints: number,
): AlignedCurves {
  const actualByHour = new Map<number, number>();
  for (const reading of readings) {
    const bucket = hourBucket(reading.timestamp);
    actualByHour.set(bucket, (actualByHour.get(bucket) ?? 0) + reading.kwh);
  }

  const aligned: AlignedCurves = { timestamps: [], actual: [], theoretical: [] };
  for (const point of theoretical) {
    const actual = actualByHour.get(hourBucket(point.timestamp));
    if (actual === undefined) continue;
    aligned.timestamps.push(point.timestamp);
    aligned.actual.push(actual);
    aligned.theoretical.push(point.kwh);
  }

  if (aligned.actual.length < minPoints) {
    throw new InsufficientSamplesError(aligned.actual.length, minPoints);
  }
  return aligned;
}

/** Signed Pearson r; 0 when either series has no variance. */
export function pearson(xs: number[], ys: number[]): number {
  if (xs.length !== ys.length || xs.length === 0) {
    return 0;
  }

  const n = xs.length;
  const meanX = xs.reduce((sum, v) => sum + v, 0) / n;
  const meanY = ys.reduce((sum, v) => sum + v, 0) / n;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  const denominator = Math.sqrt(varianceX * varianceY);
  if (denominator === 0) {
    return 0;
  }
  return Math.max(-1, Math.min(1, covariance / denominator));
}
