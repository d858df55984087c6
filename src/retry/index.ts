/**
 * Retry Module
 */

export {
  waitFor,
  ignoreStale,
  sleep,
  describeOperation,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  type WaitOperation,
  type WaitOptions,
  type Settled,
} from './retry-engine.js';
