/**
 * Tests for error types and failure descriptions
 */

import { describe, it, expect } from 'vitest';

import {
  ErrorCategory,
  RetryMisuseError,
  RetryRoundsError,
  describeError,
  errorCode,
  toError,
} from '../index.js';

describe('RetryMisuseError', () => {
  it('should carry code, category and reason', () => {
    const error = new RetryMisuseError('empty_schedule', 'Delay schedule yielded no values');

    expect(error).toBeInstanceOf(RetryRoundsError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RetryMisuseError');
    expect(error.code).toBe('RETRY_MISUSE');
    expect(error.category).toBe(ErrorCategory.MISUSE);
    expect(error.reason).toBe('empty_schedule');
  });

  it('should format for logging with merged data', () => {
    const error = new RetryMisuseError('invalid_delay', 'Delay must be non-negative', {
      delayMs: -1,
    });

    expect(error.toLogFormat()).toEqual({
      name: 'RetryMisuseError',
      message: 'Delay must be non-negative',
      code: 'RETRY_MISUSE',
      category: 'misuse',
      data: { reason: 'invalid_delay', delayMs: -1 },
    });
  });

  it('should mark a scheduler that ended without an outcome', () => {
    const error = new RetryMisuseError('no_outcome', 'Scheduler finished without an outcome');

    expect(error.reason).toBe('no_outcome');
    expect(error.data).toEqual({ reason: 'no_outcome' });
  });
});

describe('describeError', () => {
  it('should describe errors by name and message', () => {
    expect(describeError(new RangeError('out of range'))).toBe('RangeError: out of range');
  });

  it('should fall back to the name for empty messages', () => {
    expect(describeError(new TypeError())).toBe('TypeError');
  });

  it('should describe strings, nullish and plain values', () => {
    expect(describeError('boom')).toBe('boom');
    expect(describeError(undefined)).toBe('undefined');
    expect(describeError(null)).toBe('null');
    expect(describeError({ status: 503 })).toBe('{"status":503}');
    expect(describeError(42)).toBe('42');
  });
});

describe('toError', () => {
  it('should return errors unchanged', () => {
    const error = new Error('same');
    expect(toError(error)).toBe(error);
  });

  it('should wrap other values', () => {
    const error = toError('plain');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain');
  });
});

describe('errorCode', () => {
  it('should read string codes', () => {
    const error = Object.assign(new Error('busy'), { code: 'EBUSY' });
    expect(errorCode(error)).toBe('EBUSY');
  });

  it('should ignore missing or non-string codes', () => {
    expect(errorCode(new Error('no code'))).toBeUndefined();
    expect(errorCode({ code: 5 })).toBeUndefined();
    expect(errorCode('EBUSY')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});
