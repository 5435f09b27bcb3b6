/**
 * Time-bounding helpers for orchestrator steps.
 */

/**
 * Thrown when a bounded operation runs out of time.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Exponential backoff: base * 2^attempt, attempt counted from 0.
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Races an operation against a deadline. The operation is not aborted on
 * timeout; its eventual result is dropped.
 */
export async function withTimeout<T>(operation: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  const pending = operation();
  // A late rejection after the timeout won must not surface as unhandled
  void pending.catch(() => undefined);

  try {
    return await Promise.race([pending, timeoutPromise]);
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}

/**
 * Bounds an operation that takes an AbortSignal. The signal fires at the
 * deadline, and the timeout is only reported once the operation has settled,
 * so nothing it started is still writing when the caller moves on.
 */
export async function withAbortTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(new TimeoutError(label, timeoutMs)), timeoutMs);

  try {
    return await operation(controller.signal);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new TimeoutError(label, timeoutMs);
    }
    throw err;
  } finally {
    clearTimeout(timeoutHandle);
  }
}
