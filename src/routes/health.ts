import { Router } from 'express';
import type { JobService } from '../services/jobs';

export function healthRouter(jobs: JobService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const snapshot = jobs.status();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      memoryMB: Math.round(process.memoryUsage().rss / 1_048_576),
      active: {
        download: snapshot.download.activeJobId !== null,
        extract: snapshot.extract.activeJobId !== null,
      },
    });
  });

  return router;
}
