import { Router } from 'express';
import type { JobService } from '../services/jobs';
import { ValidationError } from '../types/errors';
import { isOperationKind } from '../types/operations';

export function progressRouter(jobs: JobService): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(jobs.status());
  });

  router.post('/:kind/abort', (req, res) => {
    const { kind } = req.params;
    if (!isOperationKind(kind)) {
      throw new ValidationError(`Unknown operation kind: ${kind}`);
    }
    const jobId = jobs.abortActive(kind);
    res.status(202).json({ kind, jobId, message: 'Abort requested' });
  });

  return router;
}
