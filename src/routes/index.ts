import type { Express } from 'express';
import type { JobService } from '../services/jobs';
import { healthRouter } from './health';
import { downloadsRouter, extractionsRouter, jobsRouter } from './jobs';
import { progressRouter } from './progress';

/**
 * Mount all route groups onto the Express app.
 */
export function registerRoutes(app: Express, jobs: JobService): void {
  app.use('/health', healthRouter(jobs));
  app.use('/jobs', jobsRouter(jobs));
  app.use('/downloads', downloadsRouter(jobs));
  app.use('/extractions', extractionsRouter(jobs));
  app.use('/progress', progressRouter(jobs));
}
