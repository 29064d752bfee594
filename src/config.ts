import dotenv from 'dotenv';

dotenv.config();

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  queryTimeoutMs: number;
}

export interface IrradianceConfig {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  cachePrecision: number;
}

export interface VerificationPolicy {
  emissionFactorKgPerKwh: number;
  minCorrelation: number;
  excessToleranceRatio: number;
  minAlignedPoints: number;
}

export interface Config {
  port: number;
  logLevel: string;
  logPretty: boolean;
  ingress: {
    corsAllowedOrigins: string[];
    jsonBodyLimit: string;
  };
  db: DbConfig;
  irradiance: IrradianceConfig;
  verification: VerificationPolicy;
}

export function parsePositiveNumber(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[config] ${label} must be a positive number`);
  }
  return parsed;
}

export function parsePositiveInt(raw: string | undefined, fallback: number, label: string): number {
  const parsed = parsePositiveNumber(raw, fallback, label);
  if (!Number.isInteger(parsed)) {
    throw new Error(`[config] ${label} must be a whole number`);
  }
  return parsed;
}

export function parseNonNegativeInt(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`[config] ${label} must be zero or a positive whole number`);
  }
  return parsed;
}

/** Decimal places kept in irradiance cache keys; `irradiance_cache.lat_key` is NUMERIC(9, 4). */
export const MAX_CACHE_PRECISION = 4;

export function parseCachePrecision(raw: string | undefined, fallback: number, label: string): number {
  const parsed = parseNonNegativeInt(raw, fallback, label);
  if (parsed > MAX_CACHE_PRECISION) {
    throw new Error(`[config] ${label} must be at most ${MAX_CACHE_PRECISION}`);
  }
  return parsed;
}

export function parseRatio(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`[config] ${label} must be a number between 0 and 1`);
  }
  return parsed;
}

export function loadVerificationPolicy(env: Record<string, string | undefined> = process.env): VerificationPolicy {
  return {
    emissionFactorKgPerKwh: parsePositiveNumber(
      env.EMISSION_FACTOR_KG_PER_KWH,
      1.2,
      'EMISSION_FACTOR_KG_PER_KWH',
    ),
    minCorrelation: parseRatio(env.MIN_CORRELATION, 0.9, 'MIN_CORRELATION'),
    excessToleranceRatio: parseRatio(env.EXCESS_TOLERANCE_RATIO, 0.02, 'EXCESS_TOLERANCE_RATIO'),
    minAlignedPoints: parsePositiveInt(env.MIN_ALIGNED_POINTS, 3, 'MIN_ALIGNED_POINTS'),
  };
}

const config: Config = {
  port: Number(process.env.PORT ?? 3001),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logPretty: (process.env.LOG_PRETTY ?? 'true').toLowerCase() === 'true',
  ingress: {
    corsAllowedOrigins: (process.env.CORS_ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    jsonBodyLimit: process.env.JSON_BODY_LIMIT ?? '5mb',
  },
  db: {
    host: process.env.DB_HOST ?? 'localhost',
    port: Number(process.env.DB_PORT ?? 5432),
    user: process.env.DB_USER ?? 'postgres',
    password: process.env.DB_PASSWORD ?? 'postgres',
    database: process.env.DB_NAME ?? 'solar_dmrv',
    queryTimeoutMs: parsePositiveInt(process.env.DB_QUERY_TIMEOUT_MS, 5_000, 'DB_QUERY_TIMEOUT_MS'),
  },
  irradiance: {
    baseUrl: (
      process.env.NASA_POWER_BASE_URL ?? 'https://power.larc.nasa.gov/api/temporal/hourly/point'
    ).replace(/\/$/, ''),
    timeoutMs: parsePositiveInt(process.env.IRRADIANCE_TIMEOUT_MS, 15_000, 'IRRADIANCE_TIMEOUT_MS'),
    maxRetries: parseNonNegativeInt(process.env.IRRADIANCE_MAX_RETRIES, 3, 'IRRADIANCE_MAX_RETRIES'),
    retryBackoffMs: parseNonNegativeInt(
      process.env.IRRADIANCE_RETRY_BACKOFF_MS,
      500,
      'IRRADIANCE_RETRY_BACKOFF_MS',
    ),
    cachePrecision: parseCachePrecision(
      process.env.IRRADIANCE_CACHE_PRECISION,
      2,
      'IRRADIANCE_CACHE_PRECISION',
    ),
  },
  verification: loadVerificationPolicy(),
};

export default config;
