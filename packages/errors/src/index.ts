/**
 * Error handling module
 *
 * Features:
 * - Base error class with stable codes and log formatting
 * - Misuse error raised by the attempt scheduler
 * - Descriptions for opaque failure values
 */

export { ErrorCategory, RetryRoundsError, RetryMisuseError, type MisuseReason } from './types.js';

export { describeError, toError, errorCode } from './utils.js';
