// Database types
export type { JobRow, JobStatus } from './database';

// API types
export type { JobDetail, KindStatus, ProgressSnapshot } from './api';

// Operation types
export type {
  ExtractionRequest,
  FailureKind,
  OperationKind,
  OperationOutcome,
  OperationResult,
  TransferRequest,
} from './operations';

// Errors
export { AppError, ConflictError, NotFoundError, ValidationError } from './errors';
