import { randomUUID } from 'crypto';
import path from 'path';
import { errorMessage, Logger } from '../helpers/logger';
import { isDirectoryMarker, isWithinRoot, withTrailingSeparator } from '../helpers/paths';
import { AppError, ConflictError, NotFoundError, ValidationError } from '../types/errors';
import { OPERATION_KINDS } from '../types/operations';
import type { JobDetail, JobRow, OperationKind, OperationResult, ProgressSnapshot } from '../types';
import type { DatabaseService } from './database';
import type { ArchiveExtractor } from './extractor';
import { OperationControls } from './progress';
import type { TransferCoordinator } from './transfer';

const log = new Logger('jobs');

export type Transferer = Pick<TransferCoordinator, 'transfer'>;
export type Unpacker = Pick<ArchiveExtractor, 'unpack'>;

export interface JobServiceOptions {
  /** Every job path is resolved beneath this directory. */
  storageRoot: string;
  controls?: OperationControls;
}

export function toJobDetail(row: JobRow): JobDetail {
  return {
    jobId: row.job_id,
    kind: row.kind,
    source: row.source,
    destination: row.destination,
    status: row.status,
    failure: row.failure,
    error: row.error,
    progress: row.progress,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

/**
 * Background queue for downloads and extractions.
 *
 * Each kind has its own FIFO queue and a single worker, so one download and
 * one extraction can run side by side but never two of the same kind. The
 * worker hands the kind's {@link OperationContext} to the operation, which is
 * how progress and abort requests reach it.
 */
export class JobService {
  readonly controls: OperationControls;
  private readonly storageRoot: string;
  private queues: Record<OperationKind, string[]> = { download: [], extract: [] };
  private active: Record<OperationKind, string | null> = { download: null, extract: null };
  private inFlight: Record<OperationKind, Promise<void> | null> = { download: null, extract: null };
  private stopped = false;

  constructor(
    private db: DatabaseService,
    private transfers: Transferer,
    private extractor: Unpacker,
    options: JobServiceOptions,
  ) {
    this.storageRoot = path.resolve(options.storageRoot);
    this.controls = options.controls ?? new OperationControls();
  }

  // ── Public API ────────────────────────────────────────────────────

  enqueueDownload(url: unknown, destination: unknown): JobDetail {
    const source = requireString(url, 'url');
    let parsed: URL;
    try {
      parsed = new URL(source);
    } catch {
      throw new ValidationError(`Invalid URL: ${source}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError(`Unsupported URL scheme: ${parsed.protocol}`);
    }

    const target = this.resolveInStorage(requireString(destination, 'destination'), 'destination');
    return this.enqueue('download', source, target);
  }

  enqueueExtraction(archive: unknown, destination: unknown): JobDetail {
    const archivePath = this.resolveInStorage(requireString(archive, 'archive'), 'archive');
    if (isDirectoryMarker(archivePath)) {
      throw new ValidationError('archive must name a file');
    }

    const target = this.resolveInStorage(requireString(destination, 'destination'), 'destination');
    return this.enqueue('extract', archivePath, target);
  }

  getJob(jobId: string): JobDetail {
    const row = this.db.getJob(jobId);
    if (!row) throw new NotFoundError('Job not found');
    return toJobDetail(row);
  }

  listJobs(): JobDetail[] {
    return this.db.getAllJobs().map(toJobDetail);
  }

  /**
   * A pending job is dropped from its queue and recorded as cancelled right
   * away. A running job is asked to stop and settles once the operation
   * notices.
   */
  cancelJob(jobId: string): JobDetail {
    const row = this.db.getJob(jobId);
    if (!row) throw new NotFoundError('Job not found');

    if (row.status === 'pending') {
      const queue = this.queues[row.kind];
      const index = queue.indexOf(jobId);
      if (index !== -1) queue.splice(index, 1);

      this.db.markFinished(jobId, {
        status: 'cancelled',
        failure: 'Cancelled',
        error: 'Cancelled before start',
        progress: row.progress,
      });
      log.info('Job cancelled', { jobId, kind: row.kind });
      return this.getJob(jobId);
    }

    if (row.status === 'running' && this.active[row.kind] === jobId) {
      this.controls.requestAbort(row.kind);
      log.info('Abort requested', { jobId, kind: row.kind });
      return toJobDetail(row);
    }

    throw new ConflictError(`Job is already ${row.status}`);
  }

  /** Returns the id of the job that was asked to stop. */
  abortActive(kind: OperationKind): string {
    const jobId = this.active[kind];
    if (!jobId) throw new ConflictError(`No ${kind} job is running`);

    this.controls.requestAbort(kind);
    log.info('Abort requested', { jobId, kind });
    return jobId;
  }

  status(): ProgressSnapshot {
    const entry = (kind: OperationKind) => ({
      percentage: this.controls.percentage(kind),
      abortRequested: this.controls.isAbortRequested(kind),
      activeJobId: this.active[kind],
      queued: this.queues[kind].length,
    });
    return { download: entry('download'), extract: entry('extract') };
  }

  /**
   * Re-queues everything a previous run left unfinished. Jobs that were
   * running when the process stopped start over from scratch.
   */
  resumeJobs(): number {
    const resetCount = this.db.resetInterruptedJobs();
    if (resetCount > 0) {
      log.info('Reset interrupted jobs', { count: resetCount });
    }

    const pending = this.db.getJobsWithStatus('pending');
    for (const job of pending) {
      if (!this.queues[job.kind].includes(job.job_id)) {
        this.queues[job.kind].push(job.job_id);
      }
    }
    if (pending.length > 0) {
      log.info('Resuming jobs', { count: pending.length });
    }

    for (const kind of OPERATION_KINDS) this.processQueue(kind);
    return pending.length;
  }

  /** Resolves once no job is running and nothing is left to start. */
  async idle(): Promise<void> {
    for (;;) {
      const running = OPERATION_KINDS
        .map(kind => this.inFlight[kind])
        .filter((p): p is Promise<void> => p !== null);
      if (running.length === 0) return;
      await Promise.all(running);
    }
  }

  /**
   * Stops taking work, drops the in-memory queues and asks running jobs to
   * stop. Queued jobs stay `pending` in the ledger for the next start.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    for (const kind of OPERATION_KINDS) {
      this.queues[kind].length = 0;
      if (this.active[kind]) this.controls.requestAbort(kind);
    }
    await this.idle();
  }

  // ── Private ───────────────────────────────────────────────────────

  private enqueue(kind: OperationKind, source: string, destination: string): JobDetail {
    if (this.stopped) throw new AppError('Service is shutting down', 503, 'unavailable');

    const row = this.db.insertJob({ jobId: randomUUID(), kind, source, destination });
    this.queues[kind].push(row.job_id);
    log.info('Job queued', { jobId: row.job_id, kind, source, destination });

    this.processQueue(kind);
    return toJobDetail(row);
  }

  private resolveInStorage(input: string, field: string): string {
    if (path.isAbsolute(input)) {
      throw new ValidationError(`${field} must be relative to the storage root`);
    }
    const resolved = path.resolve(this.storageRoot, input);
    if (!isWithinRoot(resolved, this.storageRoot)) {
      throw new ValidationError(`${field} escapes the storage root`);
    }
    return isDirectoryMarker(input) ? withTrailingSeparator(resolved) : resolved;
  }

  private processQueue(kind: OperationKind): void {
    if (this.stopped || this.active[kind]) return;

    const jobId = this.queues[kind].shift();
    if (!jobId) return;

    this.active[kind] = jobId;
    this.inFlight[kind] = this.runJob(kind, jobId)
      .catch((err: unknown) => {
        log.error('Job crashed', { jobId, kind, error: errorMessage(err) });
        try {
          this.db.markFinished(jobId, {
            status: 'failed',
            failure: null,
            error: errorMessage(err),
            progress: this.controls.percentage(kind),
          });
        } catch (dbErr) {
          log.error('Failed to record crashed job', { jobId, kind, error: errorMessage(dbErr) });
        }
      })
      .finally(() => {
        this.active[kind] = null;
        this.inFlight[kind] = null;
        this.processQueue(kind);
      });
  }

  private async runJob(kind: OperationKind, jobId: string): Promise<void> {
    const job = this.db.getJob(jobId);
    if (!job || job.status !== 'pending') return;

    const context = this.controls.context(kind);
    context.monitor.reset();
    this.db.markRunning(jobId);
    log.info('Job started', { jobId, kind });

    const result: OperationResult = kind === 'download'
      ? await this.transfers.transfer({ url: job.source, destination: job.destination }, context)
      : await this.extractor.unpack({ archivePath: job.source, destinationDir: job.destination }, context);

    this.db.markFinished(jobId, {
      status: result.outcome,
      failure: result.failure ?? null,
      error: result.message ?? null,
      progress: context.percentage,
    });
    log.info('Job finished', { jobId, kind, outcome: result.outcome });
  }
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value;
}
