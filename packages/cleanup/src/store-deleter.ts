/**
 * Store deletion with a retried delete per component
 */

import { describeError } from '@retry-rounds/errors';
import { LoggerFactory, type Logger } from '@retry-rounds/logging';
import {
  RetryConditions,
  retry,
  type RetryOptions,
  type RetryPredicate,
} from '@retry-rounds/retry';

import {
  DEFAULT_MAX_ATTEMPTS,
  reportComponentFailure,
  reportDeleteOutcome,
  reportDeletionFailure,
  type DeleteOutcome,
} from './reporting.js';

/**
 * A store made of independently deletable components
 */
export interface DeletableStore {
  readonly locator: string;
  exists(): Promise<boolean>;
  listComponents(): Promise<string[]>;
  deleteComponent(name: string): Promise<void>;
}

export interface ComponentFailure {
  component: string;
  error: string;
}

export interface DeleteSummary {
  locator: string;
  outcome: DeleteOutcome;
  deleted: string[];
  failed: ComponentFailure[];
}

export interface StoreDeleterOptions {
  logger?: Logger;
  /** Which failures are worth another round; defaults to transient filesystem codes */
  isRecoverable?: RetryPredicate;
  maxAttempts?: number;
  /** Schedule, budget and time primitives for each component's scheduler */
  retry?: Omit<RetryOptions, 'predicate' | 'logger'>;
}

export const TRANSIENT_FS_CODES = ['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ENOTEMPTY'] as const;

export class StoreDeleter {
  private readonly logger: Logger;
  private readonly isRecoverable: RetryPredicate;
  private readonly maxAttempts: number;
  private readonly retryOptions: Omit<RetryOptions, 'predicate' | 'logger'>;

  constructor(options: StoreDeleterOptions = {}) {
    this.logger = options.logger ?? LoggerFactory.createConsoleLogger('cleanup');
    this.isRecoverable =
      options.isRecoverable ?? RetryConditions.errorCodes(...TRANSIENT_FS_CODES);
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryOptions = options.retry ?? {};
  }

  /**
   * Delete every component of the store. Components that keep failing are
   * recorded and skipped.
   */
  async deleteStore(store: DeletableStore): Promise<DeleteSummary> {
    const deleted: string[] = [];
    const failed: ComponentFailure[] = [];

    const existed = await store.exists();
    if (existed) {
      for (const component of await store.listComponents()) {
        try {
          await this.deleteComponent(store, component);
          deleted.push(component);
        } catch (error) {
          failed.push({ component, error: describeError(error) });
        }
      }
    }

    const outcome = reportDeleteOutcome(this.logger, store.locator, existed, failed.length > 0);
    return { locator: store.locator, outcome, deleted, failed };
  }

  /**
   * Each failed round is logged once: by `reportComponentFailure` when the
   * failure is recoverable and the budget allows another round, otherwise
   * when the failure propagates.
   */
  private async deleteComponent(store: DeletableStore, component: string): Promise<void> {
    let attemptNumber = 0;
    let reportedRound = 0;
    const predicate: RetryPredicate = error => {
      if (!this.isRecoverable(error)) {
        return false;
      }
      reportedRound = attemptNumber;
      return !reportComponentFailure(
        this.logger,
        error,
        component,
        attemptNumber,
        this.maxAttempts
      );
    };

    try {
      for await (const attempt of retry({ ...this.retryOptions, logger: this.logger, predicate })) {
        attemptNumber = attempt.number;
        await attempt.run(() => store.deleteComponent(component));
      }
    } catch (error) {
      if (reportedRound !== attemptNumber) {
        reportDeletionFailure(this.logger, error, component, attemptNumber);
      }
      throw error;
    }
  }
}
