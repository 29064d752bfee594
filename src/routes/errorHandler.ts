import type { ErrorRequestHandler } from 'express';
import { DmrvError } from '../errors';
import logger from '../logger';

interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof DmrvError) {
    const log = err.status >= 500 ? 'warn' : 'debug';
    logger[log]('[http] request failed', {
      method: req.method,
      path: req.originalUrl,
      kind: err.kind,
      status: err.status,
    });
    res.status(err.status).json(err.toJSON());
    return;
  }

  if (isBodyParserError(err) && err.status < 500) {
    logger.warn('[http] unreadable request body', { path: req.originalUrl, type: err.type });
    res.status(err.status).json({ error: 'validation_failed', message: err.message });
    return;
  }

  logger.error({ err, method: req.method, path: req.originalUrl }, '[http] unhandled error');
  res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
};
