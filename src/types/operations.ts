export type OperationKind = 'download' | 'extract';

export const OPERATION_KINDS: readonly OperationKind[] = ['download', 'extract'];

export type FailureKind =
  | 'InvalidInput'
  | 'InitializationFailure'
  | 'IOFailure'
  | 'TransportFailure'
  | 'EmptyResult'
  | 'Cancelled';

export type OperationOutcome = 'completed' | 'failed' | 'cancelled';

export interface OperationResult {
  ok: boolean;
  outcome: OperationOutcome;
  failure?: FailureKind;
  message?: string;
}

export interface TransferRequest {
  url: string;
  /** A full file path, or a directory when it ends with `/`. */
  destination: string;
}

export interface ExtractionRequest {
  archivePath: string;
  destinationDir: string;
}

export function completed(): OperationResult {
  return { ok: true, outcome: 'completed' };
}

export function failed(failure: FailureKind, message: string): OperationResult {
  return {
    ok: false,
    outcome: failure === 'Cancelled' ? 'cancelled' : 'failed',
    failure,
    message,
  };
}

export function isOperationKind(value: unknown): value is OperationKind {
  return value === 'download' || value === 'extract';
}
