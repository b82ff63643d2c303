/**
 * Attempt scheduler: a single-pass sequence of attempt guards
 */

import { RetryMisuseError } from '@retry-rounds/errors';
import { LoggerFactory, type Logger } from '@retry-rounds/logging';

import { RepeatedAttempt, SingleAttempt, type RoundContext } from './attempt.js';
import { RetryConditions } from './conditions.js';
import { DelaySchedule } from './schedule.js';
import {
  DEFAULT_DELAYS_MS,
  DEFAULT_TIMEOUT_MS,
  type AttemptGuard,
  type Clock,
  type RetryOptions,
  type RetryPredicate,
  type Sleep,
} from './types.js';

const defaultLogger = LoggerFactory.createConsoleLogger('retry');

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Yields one attempt guard per round until a round succeeds or a failure is
 * propagated.
 *
 * ```ts
 * for await (const attempt of retry({ timeoutMs: 60_000, predicate: isTransient })) {
 *   await attempt.run(() => store.delete(key));
 * }
 * ```
 *
 * The deadline is fixed at construction. Each scheduler serves one logical
 * operation and can be iterated once.
 */
export class AttemptScheduler implements AsyncIterable<AttemptGuard> {
  private readonly delays: Iterable<number>;
  private readonly timeoutMs: number;
  private readonly predicate: RetryPredicate;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly deadline: number;
  private proceed = true;
  private iterated = false;

  constructor(options: RetryOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new RetryMisuseError(
        'invalid_timeout',
        `Timeout must be finite and non-negative, got ${timeoutMs}`,
        { timeoutMs }
      );
    }

    this.delays = options.delaysMs ?? DEFAULT_DELAYS_MS;
    this.timeoutMs = timeoutMs;
    this.predicate = options.predicate ?? RetryConditions.never();
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.deadline = this.clock() + timeoutMs;
  }

  getDeadline(): number {
    return this.deadline;
  }

  [Symbol.asyncIterator](): AsyncIterator<AttemptGuard> {
    if (this.iterated) {
      throw new RetryMisuseError(
        'already_iterated',
        'An attempt scheduler can only be iterated once'
      );
    }
    this.iterated = true;

    return this.timeoutMs === 0 ? this.singleRound() : this.rounds();
  }

  private async *singleRound(): AsyncGenerator<AttemptGuard, void, undefined> {
    const attempt = new SingleAttempt();
    yield attempt;
    AttemptScheduler.ensureRun(attempt);
  }

  private async *rounds(): AsyncGenerator<AttemptGuard, void, undefined> {
    const schedule = new DelaySchedule(this.delays);
    const context: RoundContext = {
      deadline: this.deadline,
      clock: this.clock,
      sleep: this.sleep,
      predicate: this.predicate,
      logger: this.logger,
      stop: () => {
        this.proceed = false;
      },
    };

    let round = 1;
    let delayMs = schedule.next();

    while (this.proceed) {
      const attempt = new RepeatedAttempt(round, delayMs, context);
      yield attempt;
      AttemptScheduler.ensureRun(attempt);

      if (!this.proceed) {
        return;
      }

      round++;
      delayMs = schedule.next();
    }
  }

  private static ensureRun(attempt: SingleAttempt | RepeatedAttempt): void {
    if (!attempt.settled) {
      throw new RetryMisuseError(
        'attempt_not_run',
        `Attempt ${attempt.number} must be run before the next one is requested`,
        { attempt: attempt.number }
      );
    }
  }
}

/**
 * Create a scheduler for one operation
 */
export function retry(options: RetryOptions = {}): AttemptScheduler {
  return new AttemptScheduler(options);
}
