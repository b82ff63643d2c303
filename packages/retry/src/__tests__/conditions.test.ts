/**
 * Tests for predicate builders and policy-based options
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { ConfigValidationError } from '@retry-rounds/configuration';
import { LogLevel } from '@retry-rounds/logging';
import { describe, expect, it } from 'vitest';

import {
  RetryConditions,
  loadRetryPolicy,
  loadRetrySetup,
  retryOptionsFromPolicy,
} from '../index.js';

class TransientError extends Error {}

describe('RetryConditions', () => {
  const busy = Object.assign(new Error('resource busy'), { code: 'EBUSY' });

  it('should provide constant predicates', () => {
    expect(RetryConditions.never()(busy)).toBe(false);
    expect(RetryConditions.always()(busy)).toBe(true);
  });

  it('should match error classes', () => {
    const predicate = RetryConditions.instanceOf(TransientError, RangeError);

    expect(predicate(new TransientError('flaky'))).toBe(true);
    expect(predicate(new RangeError('bounds'))).toBe(true);
    expect(predicate(new TypeError('type'))).toBe(false);
    expect(predicate('TransientError')).toBe(false);
  });

  it('should match system error codes', () => {
    const predicate = RetryConditions.errorCodes('EBUSY', 'EAGAIN');

    expect(predicate(busy)).toBe(true);
    expect(predicate(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(predicate(new Error('no code'))).toBe(false);
  });

  it('should match messages and descriptions', () => {
    expect(RetryConditions.messageMatches('busy')(busy)).toBe(true);
    expect(RetryConditions.messageMatches(/^resource/)(busy)).toBe(true);
    expect(RetryConditions.messageMatches(/^resource/)(new Error('other resource'))).toBe(false);
    expect(RetryConditions.messageMatches('503')({ status: 503 })).toBe(true);
  });

  it('should combine predicates', () => {
    const isBusy = RetryConditions.errorCodes('EBUSY');
    const mentionsLock = RetryConditions.messageMatches('lock');
    const locked = Object.assign(new Error('lock held'), { code: 'EBUSY' });

    expect(RetryConditions.anyOf(isBusy, mentionsLock)(busy)).toBe(true);
    expect(RetryConditions.allOf(isBusy, mentionsLock)(busy)).toBe(false);
    expect(RetryConditions.allOf(isBusy, mentionsLock)(locked)).toBe(true);
    expect(RetryConditions.not(isBusy)(busy)).toBe(false);
    expect(RetryConditions.anyOf()(busy)).toBe(false);
  });
});

describe('retry policy', () => {
  it('should map a policy onto scheduler options', () => {
    const predicate = RetryConditions.always();
    const options = retryOptionsFromPolicy({ delays: [0, 2000], timeout: 60000 }, { predicate });

    expect(options).toEqual({ predicate, delaysMs: [0, 2000], timeoutMs: 60000 });
  });

  it('should load the retry section from YAML', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retry-rounds-policy-'));
    const file = path.join(dir, 'retry.yaml');
    await fs.writeFile(file, 'retry:\n  delays: [250ms, 1s]\n  timeout: ${RETRY_ROUNDS_TEST_BUDGET:-30s}\n');

    try {
      expect(await loadRetryPolicy(file)).toEqual({ delays: [250, 1000], timeout: 30000 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should build the logger and options from one file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retry-rounds-policy-'));
    const file = path.join(dir, 'retry-rounds.yaml');
    await fs.writeFile(
      file,
      'logging:\n  level: WARN\n  format: json\nretry:\n  delays: [2s]\n  timeout: 1m\n'
    );

    try {
      const { logger, options } = await loadRetrySetup(file, 'cleanup');

      expect(logger.getLevel()).toBe(LogLevel.WARN);
      expect(logger.getComponent()).toBe('cleanup');
      expect(options).toEqual({ logger, delaysMs: [2000], timeoutMs: 60000 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should reject invalid policies', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retry-rounds-policy-'));
    const file = path.join(dir, 'retry.yaml');
    await fs.writeFile(file, 'retry:\n  timeout: -5\n');

    try {
      await expect(loadRetryPolicy(file)).rejects.toBeInstanceOf(ConfigValidationError);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
