/**
 * Tests for withRetry, retry wrappers and the scheduler on real timers
 */

import { describe, expect, it, vi } from 'vitest';

import { RetryConditions, RetryUtils, retry, withRetry } from '../index.js';

import { FakeTime, memoryLogger } from './helpers.js';

describe('withRetry', () => {
  it('should pass the attempt number and resolve the first successful value', async () => {
    const time = new FakeTime();
    const work = vi.fn(async (attempt: number) => {
      if (attempt < 3) {
        throw new Error(`not yet ${attempt}`);
      }
      return `ready after ${attempt}`;
    });

    const result = await withRetry(work, {
      clock: time.clock,
      sleep: time.sleep,
      logger: memoryLogger().logger,
      delaysMs: [100],
      timeoutMs: 1000,
      predicate: RetryConditions.messageMatches(/^not yet/),
    });

    expect(result).toBe('ready after 3');
    expect(work.mock.calls).toEqual([[1], [2], [3]]);
    expect(time.sleeps).toEqual([100, 100]);
  });

  it('should reject with the last failure unchanged', async () => {
    const time = new FakeTime();
    const failures: Error[] = [];

    const promise = withRetry(
      attempt => {
        const failure = new Error(`attempt ${attempt}`);
        failures.push(failure);
        throw failure;
      },
      {
        clock: time.clock,
        sleep: time.sleep,
        logger: memoryLogger().logger,
        delaysMs: [100],
        timeoutMs: 150,
        predicate: () => true,
      }
    );
    const error = await promise.catch((caught: unknown) => caught);

    expect(error).toBe(failures[1]);
    expect(failures.map(failure => failure.message)).toEqual(['attempt 1', 'attempt 2']);
  });

  it('should reject with the sleep failure when the wait is cancelled', async () => {
    const cancelled = new Error('cancelled');
    const work = vi.fn(async (): Promise<string> => {
      throw new Error('busy');
    });

    const error = await withRetry(work, {
      logger: memoryLogger().logger,
      delaysMs: [10],
      timeoutMs: 1000,
      predicate: () => true,
      sleep: async () => {
        throw cancelled;
      },
    }).catch((caught: unknown) => caught);

    expect(error).toBe(cancelled);
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should accept synchronous work', async () => {
    await expect(withRetry(() => 42)).resolves.toBe(42);
  });
});

describe('RetryUtils.createRetryWrapper', () => {
  it('should give every call its own scheduler', async () => {
    const time = new FakeTime();
    const calls: string[] = [];
    const fetchRecord = async (id: string): Promise<string> => {
      calls.push(id);
      if (calls.filter(call => call === id).length === 1) {
        throw new Error(`cold cache for ${id}`);
      }
      return `record ${id}`;
    };

    const wrapped = RetryUtils.createRetryWrapper(fetchRecord, {
      clock: time.clock,
      sleep: time.sleep,
      logger: memoryLogger().logger,
      delaysMs: [10],
      timeoutMs: 100,
      predicate: () => true,
    });

    expect(await wrapped('a')).toBe('record a');
    expect(await wrapped('b')).toBe('record b');
    expect(calls).toEqual(['a', 'a', 'b', 'b']);
  });
});

describe('AttemptScheduler on real timers', () => {
  it('should make several attempts within a short budget and keep the last failure', async () => {
    let attempts = 0;

    const run = async (): Promise<void> => {
      for await (const attempt of retry({
        delaysMs: [0],
        timeoutMs: 100,
        predicate: RetryConditions.always(),
        logger: memoryLogger().logger,
      })) {
        await attempt.run(() => {
          attempts++;
          throw new Error('foo');
        });
      }
    };

    const started = Date.now();
    await expect(run()).rejects.toThrow('foo');

    expect(attempts).toBeGreaterThan(1);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should make one attempt with a zero budget', async () => {
    let attempts = 0;

    const run = async (): Promise<void> => {
      for await (const attempt of retry({
        delaysMs: [0],
        timeoutMs: 0,
        predicate: RetryConditions.always(),
      })) {
        await attempt.run(() => {
          attempts++;
          throw new Error('foo');
        });
      }
    };

    await expect(run()).rejects.toThrow('foo');
    expect(attempts).toBe(1);
  });

  it('should make one attempt when the predicate rejects', async () => {
    let attempts = 0;

    const run = async (): Promise<void> => {
      for await (const attempt of retry({
        delaysMs: [0],
        timeoutMs: 100,
        predicate: RetryConditions.never(),
      })) {
        await attempt.run(() => {
          attempts++;
          throw new Error('foo');
        });
      }
    };

    await expect(run()).rejects.toThrow('foo');
    expect(attempts).toBe(1);
  });

  it('should make one attempt when nothing fails', async () => {
    let attempts = 0;

    for await (const attempt of retry({
      delaysMs: [0],
      timeoutMs: 100,
      predicate: RetryConditions.always(),
    })) {
      await attempt.run(() => {
        attempts++;
      });
    }

    expect(attempts).toBe(1);
  });
});
