/**
 * Retry module - attempt scheduler with caller-supplied delays and predicate
 *
 * Features:
 * - Single-pass sequence of attempt guards, one per round
 * - Delay schedule with last-value reuse
 * - Best-effort overall time budget fixed at construction
 * - Original failure propagated unchanged once rounds stop
 */

export {
  DEFAULT_DELAYS_MS,
  DEFAULT_TIMEOUT_MS,
  type AttemptGuard,
  type AttemptOutcome,
  type Clock,
  type RetryOptions,
  type RetryPredicate,
  type Sleep,
} from './types.js';

export { AttemptScheduler, retry } from './scheduler.js';
export { DelaySchedule } from './schedule.js';
export { RetryConditions } from './conditions.js';
export { RetryUtils, withRetry } from './executor.js';
export {
  loadRetryPolicy,
  loadRetrySetup,
  retryOptionsFromPolicy,
  type RetrySetup,
} from './policy.js';
