import type { FailureKind, OperationKind } from './operations';
import type { JobStatus } from './database';

export interface JobDetail {
  jobId: string;
  kind: OperationKind;
  source: string;
  destination: string;
  status: JobStatus;
  failure: FailureKind | null;
  error: string | null;
  progress: number;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface KindStatus {
  /** -1 while nothing has been reported. */
  percentage: number;
  abortRequested: boolean;
  activeJobId: string | null;
  queued: number;
}

export type ProgressSnapshot = Record<OperationKind, KindStatus>;
