/**
 * Retry Engine
 *
 * Polling primitive that turns asynchronous browser state into linear caller
 * code: `await waitFor(() => condition)` returns the first non-falsy value or
 * raises a TimeoutError naming the waited expression.
 *
 * Only errors flagged `retryable` (stale handles, unmet conditions) are
 * retried. Everything else propagates on the attempt that raised it.
 */

import { StaleHandleError, TimeoutError, isRetryable, toError } from '../shared/errors/index.js';

/** Fixed backoff between attempts (ms) */
export const DEFAULT_POLL_INTERVAL_MS = 50;

/** Default deadline for a wait (ms) */
export const DEFAULT_WAIT_TIMEOUT_MS = 10_000;

export type WaitOperation<T> = () => T | Promise<T>;

/** `false`, `null` and `undefined` mean "not yet"; every other value is a result */
export type Settled<T> = Exclude<T, false | null | undefined>;

export interface WaitOptions {
  /** Deadline measured from the first attempt */
  timeoutMs?: number;
  /** Pause between attempts */
  pollIntervalMs?: number;
  /** Human-readable form of the waited expression, used in the timeout message */
  description?: string;
}

/**
 * Sleep for specified milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isSettled<T>(value: T): value is Settled<T> {
  return value !== false && value !== null && value !== undefined;
}

/**
 * Source text of the operation with whitespace collapsed, e.g.
 * `() => tracker.activities().length === 0`.
 */
export function describeOperation(operation: WaitOperation<unknown>): string {
  return operation.toString().replace(/\s+/g, ' ').trim();
}

/**
 * Re-run `operation` until it yields a value other than `false`, `null` or
 * `undefined`.
 *
 * @throws TimeoutError when the deadline passes; carries the last observed
 *   value and, as `cause`, the last retryable error
 * @throws the first non-retryable error raised by `operation`, unchanged
 *
 * @example
 * ```typescript
 * const button = await waitFor(() => querySelector(registry, '#submit'), {
 *   timeoutMs: 2000,
 * });
 * ```
 */
export async function waitFor<T>(
  operation: WaitOperation<T>,
  options: WaitOptions = {},
): Promise<Settled<Awaited<T>>> {
  const {
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    description,
  } = options;

  const deadline = Date.now() + timeoutMs;
  let lastValue: unknown;
  let lastError: Error | undefined;

  for (;;) {
    try {
      const value = await operation();
      if (isSettled(value)) {
        return value;
      }
      lastValue = value;
      lastError = undefined;
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = toError(error);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError(description ?? describeOperation(operation), timeoutMs, lastValue, lastError);
    }

    await sleep(Math.min(pollIntervalMs, remaining));
  }
}

/**
 * Run `operation`, mapping a StaleHandleError to `null`.
 *
 * Useful inside `waitFor` conditions where a vanished element simply means
 * "not there yet".
 */
export async function ignoreStale<T>(operation: WaitOperation<T>): Promise<Awaited<T> | null> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof StaleHandleError) {
      return null;
    }
    throw error;
  }
}
