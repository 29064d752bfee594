import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { InsufficientSamplesError } from '../src/errors';
import { buildTheoreticalCurve } from '../src/services/solar/solarIrradianceModel';
import { alignCurves, pearson } from '../src/services/verification/correlation';
import { describeExcess, scoreVerification } from '../src/services/verification/fraudDetector';
import type { Reading } from '../src/types/dmrv';
import {
  asReadings,
  CLEAR_DAY_IRRADIANCE,
  DEFAULT_POLICY,
  ERRATIC_50_KWH,
  hourAt,
  hourlyReadings,
  IMPOSSIBLE_80_KWH,
  irradianceSamples,
  TEST_DATE,
  TRACKING_50_KWH,
} from './support/fixtures';

const curve = buildTheoreticalCurve(irradianceSamples(CLEAR_DAY_IRRADIANCE), 10);

describe('pearson', () => {
  it('is 1 for perfectly proportional series and -1 for inverted ones', () => {
    assert.equal(pearson([1, 2, 3], [2, 4, 6]), 1);
    assert.equal(pearson([1, 2, 3], [3, 2, 1]), -1);
  });

  it('is 0 when a series has no variance', () => {
    assert.equal(pearson([4, 4, 4], [1, 2, 3]), 0);
    assert.equal(pearson([], []), 0);
  });
});

describe('alignCurves', () => {
  it('sums readings inside the same UTC hour', () => {
    const readings: Reading[] = [
      { inverterId: 1, timestamp: new Date(`${TEST_DATE}T08:00:00Z`), kwh: 2 },
      { inverterId: 1, timestamp: new Date(`${TEST_DATE}T08:30:00Z`), kwh: 2.5 },
      { inverterId: 1, timestamp: new Date(`${TEST_DATE}T09:15:00Z`), kwh: 7 },
      { inverterId: 1, timestamp: new Date(`${TEST_DATE}T10:45:00Z`), kwh: 9 },
    ];
    const aligned = alignCurves(readings, curve.points, 3);

    assert.deepEqual(aligned.actual, [4.5, 7, 9]);
    assert.deepEqual(aligned.theoretical, [5, 8, 10]);
    assert.deepEqual(aligned.timestamps, [hourAt(TEST_DATE, 8), hourAt(TEST_DATE, 9), hourAt(TEST_DATE, 10)]);
  });

  it('leaves out hours without readings and fails below the minimum', () => {
    const readings = asReadings(1, hourlyReadings([4, 7]));
    assert.throws(
      () => alignCurves(readings, curve.points, 3),
      (err: unknown) =>
        err instanceof InsufficientSamplesError && err.alignedPoints === 2 && err.required === 3,
    );
  });
});

describe('scoreVerification', () => {
  it('verifies production that tracks the irradiance curve', () => {
    const decision = scoreVerification(asReadings(1, hourlyReadings(TRACKING_50_KWH)), curve, DEFAULT_POLICY);

    assert.equal(decision.status, 'VERIFIED');
    assert.equal(decision.flaggedReason, null);
    assert.ok(decision.correlation > 0.98 && decision.correlation < 0.99);
    assert.equal(decision.actualTotalKwh, 50);
    assert.equal(decision.theoreticalTotalKwh, 60);
    assert.equal(decision.alignedPoints, 8);
  });

  it('flags output above the theoretical maximum even with a strong correlation', () => {
    const decision = scoreVerification(asReadings(1, hourlyReadings(IMPOSSIBLE_80_KWH)), curve, DEFAULT_POLICY);

    assert.equal(decision.status, 'FLAGGED');
    assert.ok(decision.correlation > 0.9);
    assert.equal(
      decision.flaggedReason,
      'Actual output 80.00 kWh exceeds theoretical maximum 60.00 kWh by 20.00 kWh',
    );
    assert.equal(decision.excessKwh, 20);
  });

  it('tolerates output within the excess ratio', () => {
    // 61 kWh against 60 * 1.02 = 61.2
    const decision = scoreVerification(
      asReadings(1, hourlyReadings([5, 8, 10, 10, 10, 8, 6, 4])),
      curve,
      DEFAULT_POLICY,
    );
    assert.notEqual(decision.status, 'FLAGGED');
  });

  it('leaves weakly correlated production pending', () => {
    const decision = scoreVerification(asReadings(1, hourlyReadings(ERRATIC_50_KWH)), curve, DEFAULT_POLICY);

    assert.equal(decision.status, 'PENDING');
    assert.equal(decision.flaggedReason, null);
    assert.ok(decision.correlation < 0);
  });

  it('keeps a correlation of exactly the threshold pending', () => {
    const decision = scoreVerification(
      asReadings(1, hourlyReadings(TRACKING_50_KWH)),
      curve,
      { ...DEFAULT_POLICY, minCorrelation: 1 },
    );
    assert.equal(decision.status, 'PENDING');
  });

  it('formats the excess reason with two decimals', () => {
    assert.equal(
      describeExcess(12.5, 10),
      'Actual output 12.50 kWh exceeds theoretical maximum 10.00 kWh by 2.50 kWh',
    );
  });
});
