import type { Request, Response, NextFunction } from 'express';
import { Logger } from '../helpers/logger';
import { AppError } from '../types/errors';

const log = new Logger('error');

interface BodyParserError extends Error {
  type: string;
  status: number;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number';
}

/**
 * Express error-handling middleware. Known errors become `{ error, code }`;
 * anything else is logged and answered with a bare 500.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  // express.json() rejections: malformed JSON, oversized body
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ error: err.message, code: err.type });
    return;
  }

  log.error('Unhandled error', {
    method: req.method,
    path: req.path,
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json({ error: 'Internal server error', code: 'internal' });
}
