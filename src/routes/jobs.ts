import { Router } from 'express';
import type { JobService } from '../services/jobs';
import type { JobDetail } from '../types';

function accepted(job: JobDetail) {
  return { jobId: job.jobId, kind: job.kind, status: job.status, message: 'Job queued' };
}

export function jobsRouter(jobs: JobService): Router {
  const router = Router();

  // ── GET / — List jobs, newest first ──────────────────────────────

  router.get('/', (_req, res) => {
    res.json(jobs.listJobs());
  });

  // ── GET /:jobId — Job details ──────────────────────────────────

  router.get('/:jobId', (req, res) => {
    res.json(jobs.getJob(req.params.jobId));
  });

  // ── POST /:jobId/cancel — Cancel a queued or running job ───────

  router.post('/:jobId/cancel', (req, res) => {
    res.json(jobs.cancelJob(req.params.jobId));
  });

  return router;
}

export function downloadsRouter(jobs: JobService): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body: Record<string, unknown> = req.body ?? {};
    res.status(202).json(accepted(jobs.enqueueDownload(body.url, body.destination)));
  });

  return router;
}

export function extractionsRouter(jobs: JobService): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body: Record<string, unknown> = req.body ?? {};
    res.status(202).json(accepted(jobs.enqueueExtraction(body.archive, body.destination)));
  });

  return router;
}
