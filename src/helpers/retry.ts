export interface RetryOptions {
  /** Total number of tries, including the first. */
  attempts: number;
  delayMs?: number;
  onFailure?: (error: unknown, attempt: number) => void;
}

/**
 * Run `operation` until it succeeds or `attempts` tries have failed, in which
 * case the last error is rethrown.
 */
export async function retry<T>(operation: () => T | Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, delayMs = 0, onFailure } = options;
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new RangeError(`attempts must be a positive integer, got ${attempts}`);
  }

  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await operation();
    } catch (error) {
      onFailure?.(error, attempt);
      if (attempt >= attempts) {
        throw error;
      }

      if (delayMs > 0) {
        await new Promise<void>((resolve) => {
          setTimeout(resolve, delayMs);
        });
      }
    }
  }
}
