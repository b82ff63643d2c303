/**
 * Callback-style helpers on top of the attempt scheduler
 */

import { RetryMisuseError } from '@retry-rounds/errors';

import { retry } from './scheduler.js';
import type { RetryOptions } from './types.js';

/**
 * Run `work` under a fresh scheduler. Resolves with the first successful value
 * or rejects with the failure of the last round, unchanged.
 */
export async function withRetry<T>(
  work: (attempt: number) => T | Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  for await (const attempt of retry(options)) {
    const outcome = await attempt.run<T>(() => work(attempt.number));
    if (outcome.status === 'succeeded') {
      return outcome.value;
    }
  }

  // Unreachable: the rounds end with a success or a rejected run
  throw new RetryMisuseError(
    'no_outcome',
    'Attempt scheduler finished without a successful attempt'
  );
}

/**
 * Utility functions for retry execution
 */
export const RetryUtils = {
  withRetry,

  /**
   * Wrap a function so that every call runs under its own scheduler, with its
   * own deadline
   */
  createRetryWrapper<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options: RetryOptions = {}
  ): (...args: A) => Promise<R> {
    return (...args: A): Promise<R> => withRetry(() => fn(...args), options);
  },
};
