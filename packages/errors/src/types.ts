/**
 * Error types and base classes shared by the retry-rounds packages
 */

/**
 * Error categories for handling errors raised by the packages themselves
 */
export enum ErrorCategory {
  /** The caller broke a usage contract (empty schedule, reused attempt, etc.) */
  MISUSE = 'misuse',
  /** Configuration could not be loaded or failed validation */
  CONFIGURATION = 'configuration',
}

/**
 * Base error class carrying a stable code and optional structured data
 */
export abstract class RetryRoundsError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly data: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.data = data;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      ...(this.data && { data: this.data }),
    };
  }
}

export type MisuseReason =
  | 'empty_schedule'
  | 'invalid_delay'
  | 'invalid_timeout'
  | 'already_iterated'
  | 'attempt_reused'
  | 'attempt_not_run'
  | 'no_outcome';

/**
 * Raised when a scheduler or one of its attempts is used against its contract.
 * Never raised for failures of the caller's own work.
 */
export class RetryMisuseError extends RetryRoundsError {
  public readonly reason: MisuseReason;

  constructor(reason: MisuseReason, message: string, data?: Record<string, unknown>) {
    super(message, 'RETRY_MISUSE', ErrorCategory.MISUSE, { reason, ...data });
    this.reason = reason;
  }
}

