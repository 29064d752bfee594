import type { IrradianceSample } from '../../types/dmrv';

export const NASA_PARAMETER = 'ALLSKY_SFC_SW_DWN';
export const NASA_FILL_VALUE = -999;

/** Client errors that mean "try again later" rather than "no such data". */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

export type IrradianceFetchResult =
  | { kind: 'found'; samples: IrradianceSample[] }
  | { kind: 'not_found'; reason: string };

export interface IrradianceSource {
  fetchDay(lat: number, lon: number, date: string, signal?: AbortSignal): Promise<IrradianceFetchResult>;
}

/** Thrown for failures worth retrying: network errors, 408, 429, 5xx, malformed bodies. */
export class IrradianceFetchError extends Error {
  constructor(
    message: string,
    public readonly httpStatus?: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'IrradianceFetchError';
  }
}

/** `Retry-After` as delta-seconds or an HTTP date; null when absent or unreadable. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
  if (header === null || header.trim() === '') return null;
  const value = header.trim();
  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }
  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

function compactDate(date: string): string {
  return date.replace(/-/g, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `YYYYMMDDHH` in UTC. */
function parseHourKey(key: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})$/.exec(key);
  if (!match) return null;
  const [, y, m, d, h] = match;
  const ts = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d), Number(h)));
  return Number.isNaN(ts.getTime()) ? null : ts;
}

export function buildRequestUrl(baseUrl: string, lat: number, lon: number, date: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('parameters', NASA_PARAMETER);
  url.searchParams.set('community', 'RE');
  url.searchParams.set('longitude', String(lon));
  url.searchParams.set('latitude', String(lat));
  url.searchParams.set('start', compactDate(date));
  url.searchParams.set('end', compactDate(date));
  url.searchParams.set('format', 'JSON');
  url.searchParams.set('time-standard', 'UTC');
  return url.toString();
}

/**
 * Turn a POWER hourly response into samples for `date`. Fill values and hours
 * outside the requested day are dropped.
 * @throws IrradianceFetchError when the body does not have the POWER shape.
 */
export function parseHourlyResponse(
  body: unknown,
  lat: number,
  lon: number,
  date: string,
): IrradianceFetchResult {
  if (!isRecord(body)) {
    throw new IrradianceFetchError('Unexpected NASA POWER response shape: body is not an object');
  }
  const properties = body.properties;
  const parameter = isRecord(properties) ? properties.parameter : undefined;
  if (!isRecord(parameter)) {
    throw new IrradianceFetchError('Unexpected NASA POWER response shape: missing properties.parameter');
  }

  const series = parameter[NASA_PARAMETER];
  if (!isRecord(series)) {
    return { kind: 'not_found', reason: `${NASA_PARAMETER} missing from response` };
  }

  const samples: IrradianceSample[] = [];
  for (const [key, raw] of Object.entries(series)) {
    const timestamp = parseHourKey(key);
    const value = Number(raw);
    if (!timestamp || timestamp.toISOString().slice(0, 10) !== date) continue;
    if (!Number.isFinite(value) || value === NASA_FILL_VALUE) continue;
    samples.push({ lat, lon, date, timestamp, allskyIrradiance: value });
  }
  samples.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  if (!samples.length) {
    return { kind: 'not_found', reason: `No ${NASA_PARAMETER} values for ${date}` };
  }
  return { kind: 'found', samples };
}

/** Hourly all-sky surface irradiance for one UTC day from the NASA POWER point API. */
export class NasaPowerClient implements IrradianceSource {
  constructor(private readonly baseUrl: string) {}

  async fetchDay(
    lat: number,
    lon: number,
    date: string,
    signal?: AbortSignal,
  ): Promise<IrradianceFetchResult> {
    const url = buildRequestUrl(this.baseUrl, lat, lon, date);

    let response: Response;
    try {
      response = await fetch(url, { signal, headers: { accept: 'application/json' } });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IrradianceFetchError(`NASA POWER request failed: ${message}`);
    }

    if (TRANSIENT_CLIENT_STATUSES.has(response.status)) {
      throw new IrradianceFetchError(
        `NASA POWER request failed: HTTP ${response.status}`,
        response.status,
        parseRetryAfter(response.headers.get('retry-after')) ?? undefined,
      );
    }
    if (response.status >= 400 && response.status < 500) {
      return { kind: 'not_found', reason: `NASA POWER rejected request: HTTP ${response.status}` };
    }
    if (!response.ok) {
      throw new IrradianceFetchError(
        `NASA POWER request failed: HTTP ${response.status}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IrradianceFetchError(`NASA POWER returned invalid JSON: ${message}`);
    }
    return parseHourlyResponse(body, lat, lon, date);
  }
}
