import type { VerificationPolicy } from '../../config';
import type { CreditStatus, Reading } from '../../types/dmrv';
import type { TheoreticalCurve } from '../solar/solarIrradianceModel';
import { alignCurves, pearson } from './correlation';

export type DecisionPolicy = Pick<
  VerificationPolicy,
  'minCorrelation' | 'excessToleranceRatio' | 'minAlignedPoints'
>;

export type VerificationOutcome = Extract<CreditStatus, 'PENDING' | 'VERIFIED' | 'FLAGGED'>;

export interface VerificationDecision {
  status: VerificationOutcome;
  correlation: number;
  flaggedReason: string | null;
  actualTotalKwh: number;
  theoreticalTotalKwh: number;
  excessKwh: number;
  alignedPoints: number;
}

export function describeExcess(actualKwh: number, theoreticalKwh: number): string {
  return (
    `Actual output ${actualKwh.toFixed(2)} kWh exceeds theoretical maximum ` +
    `${theoreticalKwh.toFixed(2)} kWh by ${(actualKwh - theoreticalKwh).toFixed(2)} kWh`
  );
}

/**
 * Score a day of readings against its theoretical curve.
 *
 * Precedence: physically impossible output (actual total above the theoretical
 * total plus tolerance) is FLAGGED whatever the correlation; otherwise r above
 * `minCorrelation` is VERIFIED; anything else stays PENDING.
 *
 * @throws InsufficientSamplesError when fewer than `minAlignedPoints` hours align.
 */
export function scoreVerification(
  readings: Reading[],
  theoretical: TheoreticalCurve,
  policy: DecisionPolicy,
): VerificationDecision {
  const aligned = alignCurves(readings, theoretical.points, policy.minAlignedPoints);
  const correlation = pearson(aligned.actual, aligned.theoretical);

  const actualTotalKwh = readings.reduce((sum, r) => sum + r.kwh, 0);
  const theoreticalTotalKwh = theoretical.totalKwh;
  const excessKwh = actualTotalKwh - theoreticalTotalKwh;
  const base = {
    correlation,
    actualTotalKwh,
    theoreticalTotalKwh,
    excessKwh,
    alignedPoints: aligned.actual.length,
  };

  if (actualTotalKwh > theoreticalTotalKwh * (1 + policy.excessToleranceRatio)) {
    return {
      ...base,
      status: 'FLAGGED',
      flaggedReason: describeExcess(actualTotalKwh, theoreticalTotalKwh),
    };
  }

  if (correlation > policy.minCorrelation) {
    return { ...base, status: 'VERIFIED', flaggedReason: null };
  }

  return { ...base, status: 'PENDING', flaggedReason: null };
}
