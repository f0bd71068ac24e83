import type { Request, Response, NextFunction } from 'express';
import { Logger } from '../helpers/logger';

const log = new Logger('http');

/**
 * Logs each request once the response is sent. Polling endpoints are logged
 * at debug level so they do not flood the log.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const meta = {
      status: res.statusCode,
      durationMs: Date.now() - start,
    };
    const message = `${req.method} ${req.originalUrl}`;

    if (req.method === 'GET' && (req.path === '/progress' || req.path === '/health')) {
      log.debug(message, meta);
    } else if (res.statusCode >= 500) {
      log.warn(message, meta);
    } else {
      log.info(message, meta);
    }
  });

  next();
}
