/**
 * Attempt guards handed out by the scheduler, one per round
 */

import { RetryMisuseError, describeError } from '@retry-rounds/errors';
import type { Logger } from '@retry-rounds/logging';

import type { AttemptGuard, AttemptOutcome, Clock, RetryPredicate, Sleep } from './types.js';

type AttemptState = 'pending' | 'running' | 'settled';

/**
 * Scheduler state a repeated attempt needs to settle its round
 */
export interface RoundContext {
  readonly deadline: number;
  readonly clock: Clock;
  readonly sleep: Sleep;
  readonly predicate: RetryPredicate;
  readonly logger: Logger;
  /** Clears the scheduler's continue flag */
  stop(): void;
}

abstract class BaseAttempt implements AttemptGuard {
  private state: AttemptState = 'pending';

  constructor(
    public readonly number: number,
    public readonly delayMs: number
  ) {}

  get settled(): boolean {
    return this.state === 'settled';
  }

  async run<T>(work: () => T | Promise<T>): Promise<AttemptOutcome<T>> {
    if (this.state !== 'pending') {
      throw new RetryMisuseError('attempt_reused', `Attempt ${this.number} has already been run`, {
        attempt: this.number,
      });
    }

    this.state = 'running';
    try {
      return await this.settle(work);
    } finally {
      this.state = 'settled';
    }
  }

  protected abstract settle<T>(work: () => T | Promise<T>): Promise<AttemptOutcome<T>>;
}

/**
 * The only round of a zero-budget scheduler: failures are never caught
 */
export class SingleAttempt extends BaseAttempt {
  constructor() {
    super(1, 0);
  }

  protected async settle<T>(work: () => T | Promise<T>): Promise<AttemptOutcome<T>> {
    return { status: 'succeeded', value: await work() };
  }
}

/**
 * A round that may be retried. The continuation check runs before sleeping,
 * so a delay that would reach the deadline ends the sequence right away.
 */
export class RepeatedAttempt extends BaseAttempt {
  constructor(
    number: number,
    delayMs: number,
    private readonly context: RoundContext
  ) {
    super(number, delayMs);
  }

  protected async settle<T>(work: () => T | Promise<T>): Promise<AttemptOutcome<T>> {
    let value: T;

    try {
      value = await work();
    } catch (error) {
      let retrying = false;
      try {
        retrying = this.shouldRetry(error);
      } finally {
        if (!retrying) {
          this.context.stop();
        }
      }

      if (!retrying) {
        throw error;
      }

      this.context.logger.info(
        `Got ${describeError(error)}, trying again in ${Math.trunc(this.delayMs / 1000)}s.`,
        {
          attempt: this.number,
          delayMs: this.delayMs,
          delaySeconds: this.delayMs / 1000,
          error: describeError(error),
        }
      );
      try {
        await this.context.sleep(this.delayMs);
      } catch (sleepError) {
        this.context.stop();
        throw sleepError;
      }

      return { status: 'retrying', error, delayMs: this.delayMs };
    }

    this.context.stop();
    return { status: 'succeeded', value };
  }

  private shouldRetry(error: unknown): boolean {
    const { clock, deadline, predicate } = this.context;
    return clock() + this.delayMs < deadline && predicate(error);
  }
}
