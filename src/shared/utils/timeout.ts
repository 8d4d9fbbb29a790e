// Timeout helper for async operations.
//
// Used to hold the player's move computation to the server's time budget:
// callers get a structured result instead of an exception on timeout, plus
// the measured duration for logging.

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

const TIMED_OUT: unique symbol = Symbol('timed-out');

/**
 * Run an async operation with an upper time bound.
 *
 * The operation is not aborted on timeout; its eventual result is ignored.
 * Errors thrown by the operation before the deadline are rethrown.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, now = Date.now } = options;
  const start = now();

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<typeof TIMED_OUT>((resolve) => {
    timeoutHandle = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const result = await Promise.race([operation(), timeoutPromise]);
    const durationMs = now() - start;
    if (result === TIMED_OUT) {
      return { kind: 'timeout', durationMs };
    }
    return { kind: 'ok', durationMs, value: result };
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}
