/**
 * Page Stabilization Utilities
 *
 * Settle-after-mutation policy shared by every state-changing action
 * (clicks, typing, form submits). Whether an action has settled is measured
 * from network/navigation activity, not from a fixed sleep.
 */

import type { Activity, ActivityTracker } from './activity-tracker.js';
import { TimeoutError } from '../shared/errors/index.js';
import { sleep, waitFor, DEFAULT_POLL_INTERVAL_MS, DEFAULT_WAIT_TIMEOUT_MS } from '../retry/retry-engine.js';

/** Default pause after the action before activity is sampled (ms) */
export const DEFAULT_MUTATION_GRACE_MS = 100;

export interface MutationOptions {
  /** Pause after the action so that requests it triggers have started */
  graceMs?: number;
  /** Deadline for the activity started by the action to finish */
  timeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Activities outstanding now that were not outstanding in `before`.
 */
export function newActivities(before: ReadonlySet<string>, current: readonly Activity[]): Activity[] {
  return current.filter((activity) => !before.has(activity.requestId));
}

/**
 * Run `action`, then wait until every request it started has finished.
 *
 * Requests already in flight before the action (long polling, analytics)
 * are ignored.
 *
 * @returns the action's result
 * @throws TimeoutError whose `lastValue` lists the activities still outstanding
 *
 * @example
 * ```typescript
 * await runMutation(tracker, () => runner.callFunction(button, 'function() { this.click(); }'));
 * ```
 */
export async function runMutation<T>(
  tracker: ActivityTracker,
  action: () => T | Promise<T>,
  options: MutationOptions = {},
): Promise<T> {
  const {
    graceMs = DEFAULT_MUTATION_GRACE_MS,
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
  } = options;

  const before = new Set(tracker.activities().map((activity) => activity.requestId));

  const result = await action();

  if (graceMs > 0) {
    await sleep(graceMs);
  }

  let pending: Activity[] = [];
  try {
    await waitFor(
      () => {
        pending = newActivities(before, tracker.activities());
        return pending.length === 0;
      },
      {
        timeoutMs,
        pollIntervalMs,
        description: 'network activity started by the action to settle',
      },
    );
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new TimeoutError(error.expression, error.timeoutMs, pending, error.cause);
    }
    throw error;
  }

  return result;
}
