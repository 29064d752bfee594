import { InsufficientDataError } from '../../errors';
import type { CurvePoint, IrradianceSample } from '../../types/dmrv';

/** Irradiance at standard test conditions, where a panel delivers its rated power. */
export const STC_IRRADIANCE_WM2 = 1000;

export interface TheoreticalCurve {
  points: CurvePoint[];
  totalKwh: number;
  peakKwh: number;
}

export interface TheoreticalModelOptions {
  intervalHours?: number;
}

/**
 * Expected energy for one irradiance interval. Scales rated capacity by irradiance
 * normalized to STC and never exceeds the rated capacity.
 */
export function estimateIntervalKwh(
  sample: Pick<IrradianceSample, 'allskyIrradiance'>,
  capacityKw: number,
  intervalHours = 1,
): number {
  const irradiance = Math.max(0, sample.allskyIrradiance);
  const powerKw = Math.min(capacityKw * (irradiance / STC_IRRADIANCE_WM2), capacityKw);
  return powerKw * intervalHours;
}

/**
 * Build the day's theoretical output curve at the resolution of the irradiance samples.
 * @throws InsufficientDataError when there are no samples for the day.
 */
export function buildTheoreticalCurve(
  samples: IrradianceSample[],
  capacityKw: number,
  options: TheoreticalModelOptions = {},
): TheoreticalCurve {
  if (samples.length === 0) {
    throw new InsufficientDataError('No irradiance samples available for the requested day');
  }
  const intervalHours = options.intervalHours ?? 1;

  const points = [...samples]
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
    .map((sample) => ({
      timestamp: sample.timestamp,
      kwh: estimateIntervalKwh(sample, capacityKw, intervalHours),
    }));

  return {
    points,
    totalKwh: points.reduce((sum, p) => sum + p.kwh, 0),
    peakKwh: points.reduce((max, p) => Math.max(max, p.kwh), 0),
  };
}
