import Database from 'better-sqlite3';
import { Logger } from '../helpers/logger';
import type { FailureKind, JobRow, JobStatus, OperationKind } from '../types';
import { runMigrations } from './migrator';

const log = new Logger('database');

export interface NewJob {
  jobId: string;
  kind: OperationKind;
  source: string;
  destination: string;
}

export interface JobOutcome {
  status: Extract<JobStatus, 'completed' | 'failed' | 'cancelled'>;
  failure: FailureKind | null;
  error: string | null;
  progress: number;
}

/** Job ledger on better-sqlite3. Pass `':memory:'` for a throwaway database. */
export class DatabaseService {
  private db: Database.Database;
  private stmts: ReturnType<DatabaseService['prepareStatements']>;

  constructor(dbPath: string) {
    log.info('Initializing database', { path: dbPath });

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');

    runMigrations(this.db);
    this.stmts = this.prepareStatements();
  }

  private prepareStatements() {
    return {
      insertJob: this.db.prepare<[string, string, string, string, string]>(`
        INSERT INTO jobs (job_id, kind, source, destination, status, created_at)
        VALUES (?, ?, ?, ?, 'pending', ?)
      `),
      getJob: this.db.prepare<[string]>('SELECT * FROM jobs WHERE job_id = ?'),
      getAllJobs: this.db.prepare('SELECT * FROM jobs ORDER BY created_at DESC, rowid DESC'),
      getJobsWithStatus: this.db.prepare<[string]>(
        'SELECT * FROM jobs WHERE status = ? ORDER BY created_at ASC, rowid ASC',
      ),
      markRunning: this.db.prepare<[string, string]>(
        "UPDATE jobs SET status = 'running', started_at = ? WHERE job_id = ?",
      ),
      markFinished: this.db.prepare<[string, string | null, string | null, number, string, string]>(
        'UPDATE jobs SET status = ?, failure = ?, error = ?, progress = ?, completed_at = ? WHERE job_id = ?',
      ),
      resetRunning: this.db.prepare(
        "UPDATE jobs SET status = 'pending', started_at = NULL WHERE status = 'running'",
      ),
    };
  }

  insertJob(job: NewJob): JobRow {
    this.stmts.insertJob.run(job.jobId, job.kind, job.source, job.destination, new Date().toISOString());
    const row = this.getJob(job.jobId);
    if (!row) throw new Error(`Job ${job.jobId} was not stored`);
    return row;
  }

  getJob(jobId: string): JobRow | undefined {
    return this.stmts.getJob.get(jobId) as JobRow | undefined;
  }

  /** Newest first. */
  getAllJobs(): JobRow[] {
    return this.stmts.getAllJobs.all() as JobRow[];
  }

  /** Oldest first, the order jobs were queued in. */
  getJobsWithStatus(status: JobStatus): JobRow[] {
    return this.stmts.getJobsWithStatus.all(status) as JobRow[];
  }

  markRunning(jobId: string): void {
    this.stmts.markRunning.run(new Date().toISOString(), jobId);
  }

  markFinished(jobId: string, outcome: JobOutcome): void {
    this.stmts.markFinished.run(
      outcome.status, outcome.failure, outcome.error, outcome.progress, new Date().toISOString(), jobId,
    );
  }

  /** Puts jobs left `running` by a previous process back to `pending`. */
  resetInterruptedJobs(): number {
    return this.stmts.resetRunning.run().changes;
  }

  close(): void {
    log.info('Closing database');
    this.db.close();
  }
}
