import type { IrradianceConfig } from '../../config';
import { IrradianceUnavailableError } from '../../errors';
import logger from '../../logger';
import type { IrradianceCacheRepository } from '../../repositories/types';
import type { IrradianceDay } from '../../types/dmrv';
import { IrradianceFetchError, type IrradianceSource } from './nasaPowerClient';

export interface IrradianceProvider {
  getIrradiance(lat: number, lon: number, date: string): Promise<IrradianceDay>;
}

export type GatewayOptions = Pick<
  IrradianceConfig,
  'timeoutMs' | 'maxRetries' | 'retryBackoffMs' | 'cachePrecision'
> & {
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function roundCoordinate(value: number, precision: number): number {
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * Cached, single-flight access to a day of irradiance. Transient source
 * failures are retried with exponential backoff, stretched to any
 * `Retry-After` the source sent; a definitive "no data" answer is not.
 */
export class IrradianceGateway implements IrradianceProvider {
  private readonly inFlight = new Map<string, Promise<IrradianceDay>>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: IrradianceSource,
    private readonly cache: IrradianceCacheRepository,
    private readonly options: GatewayOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get pendingFetches(): number {
    return this.inFlight.size;
  }

  getIrradiance(lat: number, lon: number, date: string): Promise<IrradianceDay> {
    const latKey = roundCoordinate(lat, this.options.cachePrecision);
    const lonKey = roundCoordinate(lon, this.options.cachePrecision);
    const cacheKey = `${latKey}:${lonKey}:${date}`;

    const pending = this.inFlight.get(cacheKey);
    if (pending) return pending;

    const task = this.load(latKey, lonKey, date).finally(() => {
      this.inFlight.delete(cacheKey);
    });
    this.inFlight.set(cacheKey, task);
    return task;
  }

  private async load(latKey: number, lonKey: number, date: string): Promise<IrradianceDay> {
    const cached = await this.cache.get(latKey, lonKey, date);
    if (cached) {
      logger.debug('[irradiance] cache hit', { latKey, lonKey, date });
      return cached;
    }

    const day = await this.fetchWithRetry(latKey, lonKey, date);
    try {
      await this.cache.put(latKey, lonKey, day);
    } catch (err) {
      logger.warn('[irradiance] cache write failed; serving uncached day', {
        latKey,
        lonKey,
        date,
        err,
      });
    }
    return day;
  }

  private async fetchWithRetry(lat: number, lon: number, date: string): Promise<IrradianceDay> {
    const { maxRetries, retryBackoffMs, timeoutMs } = this.options;
    const attempts = maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        const result = await this.fetchOnce(lat, lon, date);
        if (result.kind === 'not_found') {
          throw new IrradianceUnavailableError(
            `No irradiance data for (${lat}, ${lon}) on ${date}: ${result.reason}`,
            true,
            { lat, lon, date },
          );
        }
        return { lat, lon, date, samples: result.samples };
      } catch (error) {
        if (error instanceof IrradianceUnavailableError) throw error;
        lastError = error;
        logger.warn('[irradiance] fetch attempt failed', {
          lat,
          lon,
          date,
          attempt,
          attempts,
          err: error,
        });
        if (attempt < attempts) {
          const backoff = retryBackoffMs * 2 ** (attempt - 1);
          // A source-requested wait is capped at one request timeout.
          const retryAfter =
            error instanceof IrradianceFetchError ? Math.min(error.retryAfterMs ?? 0, timeoutMs) : 0;
          await this.sleep(Math.max(backoff, retryAfter));
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new IrradianceUnavailableError(
      `Irradiance source unavailable after ${attempts} attempts: ${message}`,
      false,
      { lat, lon, date, attempts },
    );
  }

  private async fetchOnce(lat: number, lon: number, date: string) {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Irradiance request timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.source.fetchDay(lat, lon, date, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
