import { EventEmitter } from 'events';
import type { OperationKind } from '../types/operations';

/** Stored while no operation has reported a total yet. */
export const UNKNOWN_PROGRESS = -1;

/** Returns true when the transfer should stop. */
export type ProgressCallback = (totalExpected: number, totalSoFar: number) => boolean;

/**
 * Holds the last reported percentage of one operation and publishes every
 * change as a `progress` event carrying the new value.
 *
 * Totals are taken as they come: repeated or shrinking reports are fine, and
 * the stored value always stays within [0, 100] (or -1 when unknown).
 */
export class ProgressMonitor extends EventEmitter {
  private value = UNKNOWN_PROGRESS;

  get percentage(): number {
    return this.value;
  }

  update(totalExpected: number, totalSoFar: number): void {
    if (!Number.isFinite(totalExpected) || totalExpected <= 0) return;
    if (!Number.isFinite(totalSoFar)) return;

    const percentage = Math.round((totalSoFar / totalExpected) * 100);
    this.set(Math.min(100, Math.max(0, percentage)));
  }

  reset(): void {
    this.set(UNKNOWN_PROGRESS);
  }

  private set(next: number): void {
    if (next === this.value) return;
    this.value = next;
    this.emit('progress', next);
  }
}

/**
 * Progress slot and cancellation flag for one kind of operation.
 *
 * The flag is cleared when an operation starts and again when the operation
 * observes it, so a consumed abort never leaks into the next call.
 * Cancellation is cooperative: downloads check it on every transport tick,
 * extractions once per archive entry. A chunk already being written always
 * completes first.
 *
 * Every request is also published as an `abort` event, so an operation that
 * is waiting on a stalled transport can react without a progress tick.
 */
export class OperationContext extends EventEmitter {
  readonly monitor = new ProgressMonitor();
  private abortRequested = false;

  constructor(readonly kind: OperationKind) {
    super();
  }

  get percentage(): number {
    return this.monitor.percentage;
  }

  requestAbort(): void {
    this.abortRequested = true;
    this.emit('abort');
  }

  isAbortRequested(): boolean {
    return this.abortRequested;
  }

  resetAbort(): void {
    this.abortRequested = false;
  }

  consumeAbort(): boolean {
    if (!this.abortRequested) return false;
    this.abortRequested = false;
    return true;
  }

  /**
   * Callback handed to the transport: records progress, then reports whether
   * the transfer has to stop. A stop also puts the percentage back to unknown.
   */
  createProgressCallback(): ProgressCallback {
    return (totalExpected, totalSoFar) => {
      this.monitor.update(totalExpected, totalSoFar);
      if (!this.consumeAbort()) return false;
      this.monitor.reset();
      return true;
    };
  }
}

/**
 * The caller-facing control surface: one independent context per
 * operation kind.
 */
export class OperationControls {
  private contexts: Record<OperationKind, OperationContext>;

  constructor() {
    this.contexts = {
      download: new OperationContext('download'),
      extract: new OperationContext('extract'),
    };
  }

  context(kind: OperationKind): OperationContext {
    return this.contexts[kind];
  }

  requestAbort(kind: OperationKind): void {
    this.contexts[kind].requestAbort();
  }

  isAbortRequested(kind: OperationKind): boolean {
    return this.contexts[kind].isAbortRequested();
  }

  percentage(kind: OperationKind): number {
    return this.contexts[kind].percentage;
  }
}
