/**
 * Building blocks for retry predicates
 */

import { describeError, errorCode } from '@retry-rounds/errors';

import type { RetryPredicate } from './types.js';

type FailureClass = new (...args: never[]) => unknown;

/**
 * Pre-built retry conditions
 */
export class RetryConditions {
  /**
   * Never retry. This is the scheduler default, so retries are always opt-in.
   */
  static never(): RetryPredicate {
    return () => false;
  }

  static always(): RetryPredicate {
    return () => true;
  }

  /**
   * Retry failures that are instances of any of the given classes
   */
  static instanceOf(...types: FailureClass[]): RetryPredicate {
    return (error: unknown) => types.some(type => error instanceof type);
  }

  /**
   * Retry Node system errors carrying one of the given codes (`EBUSY`, `ECONNRESET`, ...)
   */
  static errorCodes(...codes: string[]): RetryPredicate {
    const accepted = new Set(codes);
    return (error: unknown) => {
      const code = errorCode(error);
      return code !== undefined && accepted.has(code);
    };
  }

  /**
   * Retry failures whose message (or description, for non-errors) matches
   */
  static messageMatches(pattern: RegExp | string): RetryPredicate {
    return (error: unknown) => {
      const text = error instanceof Error ? error.message : describeError(error);
      return typeof pattern === 'string' ? text.includes(pattern) : pattern.test(text);
    };
  }

  static anyOf(...predicates: RetryPredicate[]): RetryPredicate {
    return (error: unknown) => predicates.some(predicate => predicate(error));
  }

  static allOf(...predicates: RetryPredicate[]): RetryPredicate {
    return (error: unknown) => predicates.every(predicate => predicate(error));
  }

  static not(predicate: RetryPredicate): RetryPredicate {
    return (error: unknown) => !predicate(error);
  }
}
