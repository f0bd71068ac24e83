import type { FailureKind, OperationKind } from './operations';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface JobRow {
  job_id: string;
  kind: OperationKind;
  source: string;
  destination: string;
  status: JobStatus;
  failure: FailureKind | null;
  error: string | null;
  progress: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}
