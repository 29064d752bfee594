import config from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const SERVICE = 'solar-dmrv-engine';

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in severity;
}

/** Errors become plain objects keeping a domain `kind` or pg `code`; dates become ISO strings. */
function toLogValue(value: unknown): unknown {
  if (value instanceof Error) {
    const out: LogMeta = { name: value.name, message: value.message };
    if ('kind' in value && typeof value.kind === 'string') out.kind = value.kind;
    if ('code' in value && typeof value.code === 'string') out.code = value.code;
    return out;
  }
  if (value instanceof Date) return value.toISOString();
  return value;
}

function pairText(key: string, value: unknown): string {
  const logValue = toLogValue(value);
  const text = typeof logValue === 'string' ? logValue : JSON.stringify(logValue);
  return /[\s"=]/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`;
}

export interface LogLineOptions {
  pretty: boolean;
  now?: Date;
}

/**
 * One output line. JSON mode carries `ts`, `level`, `service` and the message
 * ahead of the meta keys; pretty mode writes meta as `key=value` pairs.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta | undefined,
  options: LogLineOptions,
): string {
  const ts = (options.now ?? new Date()).toISOString();
  const entries = Object.entries(meta ?? {}).filter(([, value]) => value !== undefined);

  if (options.pretty) {
    const pairs = entries.map(([key, value]) => pairText(key, value));
    return [ts, level.toUpperCase().padEnd(5), message, ...pairs].join(' ');
  }

  const record: LogMeta = { ts, level, service: SERVICE, message };
  for (const [key, value] of entries) {
    if (!(key in record)) record[key] = toLogValue(value);
  }
  return JSON.stringify(record);
}

function enabled(level: LogLevel): boolean {
  const threshold = isLogLevel(config.logLevel) ? severity[config.logLevel] : severity.info;
  return severity[level] >= threshold;
}

function emit(level: LogLevel, message: string, meta?: LogMeta) {
  if (!enabled(level)) return;
  const line = formatLogLine(level, message, meta, { pretty: config.logPretty });
  // eslint-disable-next-line no-console
  console[level === 'debug' ? 'log' : level](line);
}

const logger = {
  debug: (message: string, meta?: LogMeta) => emit('debug', message, meta),
  info: (message: string, meta?: LogMeta) => emit('info', message, meta),
  warn: (message: string, meta?: LogMeta) => emit('warn', message, meta),
  error: (meta: LogMeta, message: string) => emit('error', message, meta),
};

export default logger;
