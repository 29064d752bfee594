import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { IrradianceUnavailableError } from '../src/errors';
import { IrradianceGateway, roundCoordinate } from '../src/services/irradiance/irradianceGateway';
import {
  IrradianceFetchError,
  type IrradianceFetchResult,
  type IrradianceSource,
} from '../src/services/irradiance/nasaPowerClient';
import { CLEAR_DAY_IRRADIANCE, irradianceSamples, TEST_DATE } from './support/fixtures';
import { MemoryStore } from './support/memoryStore';

type Step = IrradianceFetchResult | Error | 'hang';

class ScriptedSource implements IrradianceSource {
  calls: Array<{ lat: number; lon: number; date: string }> = [];
  aborted = 0;

  constructor(private readonly steps: Step[]) {}

  async fetchDay(lat: number, lon: number, date: string, signal?: AbortSignal): Promise<IrradianceFetchResult> {
    this.calls.push({ lat, lon, date });
    const step = this.steps.shift() ?? found();
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (step === 'hang') {
      return new Promise<IrradianceFetchResult>((_, reject) => {
        signal?.addEventListener('abort', () => {
          this.aborted += 1;
          reject(new Error('aborted'));
        });
      });
    }
    if (step instanceof Error) throw step;
    return step;
  }
}

function found(): IrradianceFetchResult {
  return { kind: 'found', samples: irradianceSamples(CLEAR_DAY_IRRADIANCE) };
}

function createGateway(steps: Step[], overrides: { timeoutMs?: number; maxRetries?: number } = {}) {
  const store = new MemoryStore();
  const source = new ScriptedSource(steps);
  const sleeps: number[] = [];
  const gateway = new IrradianceGateway(source, store.irradianceCache, {
    timeoutMs: overrides.timeoutMs ?? 1_000,
    maxRetries: overrides.maxRetries ?? 3,
    retryBackoffMs: 100,
    cachePrecision: 2,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { store, source, sleeps, gateway };
}

describe('irradiance gateway', () => {
  it('rounds coordinates for the cache key', () => {
    assert.equal(roundCoordinate(12.9716, 2), 12.97);
    assert.equal(roundCoordinate(-0.001, 2), 0);
    assert.equal(roundCoordinate(77.5946, 2), 77.59);
  });

  it('fetches once and serves nearby coordinates from the cache', async () => {
    const { store, source, gateway } = createGateway([found()]);

    const first = await gateway.getIrradiance(12.9716, 77.5946, TEST_DATE);
    const second = await gateway.getIrradiance(12.9701, 77.5899, TEST_DATE);

    assert.equal(source.calls.length, 1);
    assert.deepEqual(source.calls[0], { lat: 12.97, lon: 77.59, date: TEST_DATE });
    assert.equal(first.samples.length, 8);
    assert.deepEqual(second, first);
    assert.equal(store.cacheWrites, 1);
  });

  it('shares one remote call between concurrent misses', async () => {
    const { source, gateway } = createGateway([found()]);

    const days = await Promise.all([
      gateway.getIrradiance(12.97, 77.59, TEST_DATE),
      gateway.getIrradiance(12.97, 77.59, TEST_DATE),
      gateway.getIrradiance(12.971, 77.589, TEST_DATE),
    ]);

    assert.equal(source.calls.length, 1);
    assert.equal(days[0], days[1]);
    assert.equal(days[1], days[2]);
    assert.equal(gateway.pendingFetches, 0);
  });

  it('retries transient failures with exponential backoff', async () => {
    const { source, sleeps, gateway } = createGateway([
      new IrradianceFetchError('HTTP 503', 503),
      new IrradianceFetchError('socket hang up'),
      found(),
    ]);

    const day = await gateway.getIrradiance(12.97, 77.59, TEST_DATE);

    assert.equal(day.samples.length, 8);
    assert.equal(source.calls.length, 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it('gives up after the retry budget', async () => {
    const { source, sleeps, gateway } = createGateway(
      [new Error('down'), new Error('down'), new Error('down')],
      { maxRetries: 2 },
    );

    await assert.rejects(
      gateway.getIrradiance(12.97, 77.59, TEST_DATE),
      (err: unknown) =>
        err instanceof IrradianceUnavailableError &&
        err.definitive === false &&
        err.message === 'Irradiance source unavailable after 3 attempts: down',
    );
    assert.equal(source.calls.length, 3);
    assert.deepEqual(sleeps, [100, 200]);
  });

  it('does not retry a definitive miss and caches nothing', async () => {
    const { store, source, sleeps, gateway } = createGateway([
      { kind: 'not_found', reason: 'No ALLSKY_SFC_SW_DWN values for 2025-01-15' },
    ]);

    await assert.rejects(
      gateway.getIrradiance(12.97, 77.59, TEST_DATE),
      (err: unknown) => err instanceof IrradianceUnavailableError && err.definitive,
    );
    assert.equal(source.calls.length, 1);
    assert.deepEqual(sleeps, []);
    assert.equal(store.cacheWrites, 0);
  });

  it('aborts a request that outlives the timeout and retries it', async () => {
    const { source, gateway } = createGateway(['hang', found()], { timeoutMs: 20 });

    const day = await gateway.getIrradiance(12.97, 77.59, TEST_DATE);

    assert.equal(day.samples.length, 8);
    assert.equal(source.calls.length, 2);
    assert.equal(source.aborted, 1);
  });

  it('waits as long as the source asks before retrying a rate-limited request', async () => {
    const { source, sleeps, gateway } = createGateway(
      [new IrradianceFetchError('HTTP 429', 429, 2_000), found()],
      { timeoutMs: 5_000 },
    );

    await gateway.getIrradiance(12.97, 77.59, TEST_DATE);

    assert.equal(source.calls.length, 2);
    assert.deepEqual(sleeps, [2_000]);
  });

  it('caps a requested retry wait at the request timeout', async () => {
    const { sleeps, gateway } = createGateway(
      [new IrradianceFetchError('HTTP 429', 429, 60_000), found()],
      { timeoutMs: 1_000 },
    );

    await gateway.getIrradiance(12.97, 77.59, TEST_DATE);

    assert.deepEqual(sleeps, [1_000]);
  });

  it('still returns the day when the cache write fails', async () => {
    const { store, source, gateway } = createGateway([found(), found()]);
    store.cacheWriteError = new Error('cache table unavailable');

    const day = await gateway.getIrradiance(12.97, 77.59, TEST_DATE);
    await gateway.getIrradiance(12.97, 77.59, TEST_DATE);

    assert.equal(day.samples.length, 8);
    assert.equal(store.cacheWrites, 2);
    assert.equal(source.calls.length, 2);
  });
});
