import express from 'express';
import type { Express } from 'express';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes } from './routes';
import type { JobService } from './services/jobs';
import { NotFoundError } from './types/errors';

export interface AppOptions {
  requestBodyMaxBytes: number;
}

export function createApp(jobs: JobService, options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json({ limit: options.requestBodyMaxBytes }));

  registerRoutes(app, jobs);

  app.use((_req, _res, next) => {
    next(new NotFoundError('Route not found'));
  });
  app.use(errorHandler);

  return app;
}
