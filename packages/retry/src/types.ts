/**
 * Attempt scheduler types and interfaces
 */

import type { Logger } from '@retry-rounds/logging';

/**
 * Decides whether a failure is recoverable. Called at most once per failed
 * round, and only while the time budget still allows another round.
 */
export type RetryPredicate = (error: unknown) => boolean;

/** Current time in milliseconds */
export type Clock = () => number;

/** Wait for the given number of milliseconds */
export type Sleep = (ms: number) => Promise<void>;

/** Delays in milliseconds before each retried round; the last one repeats */
export const DEFAULT_DELAYS_MS: readonly number[] = [0, 1000, 1000, 4000, 16000, 64000];

/** Overall budget for all rounds together: five minutes */
export const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * Scheduler options
 */
export interface RetryOptions {
  /**
   * Delay before each retried round in milliseconds. May be infinite; must
   * yield at least one value. Pass an array when the same options are reused
   * for several schedulers, since a generator can only be consumed once.
   */
  delaysMs?: Iterable<number>;
  /**
   * Best-effort budget for all rounds together. No round starts once its delay
   * would reach the deadline; a running attempt is never interrupted.
   * `0` means exactly one attempt without any retry.
   */
  timeoutMs?: number;
  /** Recoverability check; the default never retries */
  predicate?: RetryPredicate;
  /** Receives one info line per retried round */
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Result of running work inside an attempt. Unrecoverable failures are not an
 * outcome: `run` rejects with them.
 */
export type AttemptOutcome<T> =
  | { status: 'succeeded'; value: T }
  | { status: 'retrying'; error: unknown; delayMs: number };

/**
 * Scoped handle for one round. `run` executes the caller's work exactly once.
 */
export interface AttemptGuard {
  /** 1-based round number */
  readonly number: number;
  /** Delay applied if this round fails and is retried */
  readonly delayMs: number;
  run<T>(work: () => T | Promise<T>): Promise<AttemptOutcome<T>>;
}
