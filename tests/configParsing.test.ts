import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  loadVerificationPolicy,
  parseCachePrecision,
  parseNonNegativeInt,
  parsePositiveInt,
  parsePositiveNumber,
  parseRatio,
} from '../src/config';

describe('config parsing', () => {
  it('uses the documented verification defaults', () => {
    assert.deepEqual(loadVerificationPolicy({}), {
      emissionFactorKgPerKwh: 1.2,
      minCorrelation: 0.9,
      excessToleranceRatio: 0.02,
      minAlignedPoints: 3,
    });
  });

  it('reads overrides from the environment', () => {
    const policy = loadVerificationPolicy({
      EMISSION_FACTOR_KG_PER_KWH: '0.82',
      MIN_CORRELATION: '0.95',
      EXCESS_TOLERANCE_RATIO: '0',
      MIN_ALIGNED_POINTS: '6',
    });
    assert.equal(policy.emissionFactorKgPerKwh, 0.82);
    assert.equal(policy.minCorrelation, 0.95);
    assert.equal(policy.excessToleranceRatio, 0);
    assert.equal(policy.minAlignedPoints, 6);
  });

  it('fails fast on invalid values', () => {
    assert.throws(() => parsePositiveNumber('-1', 1, 'X'), /\[config\] X must be a positive number/);
    assert.throws(() => parsePositiveInt('2.5', 1, 'N'), /\[config\] N must be a whole number/);
    assert.throws(() => parseNonNegativeInt('-3', 0, 'R'), /\[config\] R must be zero or a positive whole number/);
    assert.throws(() => parseRatio('1.5', 0.9, 'MIN_CORRELATION'), /between 0 and 1/);
    assert.throws(() => loadVerificationPolicy({ MIN_ALIGNED_POINTS: 'abc' }), /MIN_ALIGNED_POINTS/);
  });

  it('limits cache precision to the stored key scale', () => {
    assert.equal(parseCachePrecision(undefined, 2, 'IRRADIANCE_CACHE_PRECISION'), 2);
    assert.equal(parseCachePrecision('4', 2, 'IRRADIANCE_CACHE_PRECISION'), 4);
    assert.equal(parseCachePrecision('0', 2, 'IRRADIANCE_CACHE_PRECISION'), 0);
    assert.throws(
      () => parseCachePrecision('6', 2, 'IRRADIANCE_CACHE_PRECISION'),
      /^Error: \[config\] IRRADIANCE_CACHE_PRECISION must be at most 4$/,
    );
    assert.throws(() => parseCachePrecision('-1', 2, 'IRRADIANCE_CACHE_PRECISION'), /zero or a positive whole number/);
  });

  it('falls back when a variable is unset', () => {
    assert.equal(parsePositiveInt(undefined, 15_000, 'IRRADIANCE_TIMEOUT_MS'), 15_000);
    assert.equal(parseNonNegativeInt('0', 3, 'IRRADIANCE_MAX_RETRIES'), 0);
  });
});
