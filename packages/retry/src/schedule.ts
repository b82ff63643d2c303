import { RetryMisuseError } from '@retry-rounds/errors';

/**
 * Cursor over a delay schedule that keeps returning the last value once the
 * underlying iterable is exhausted.
 */
export class DelaySchedule {
  private readonly iterator: Iterator<number>;
  private last: number | undefined;
  private exhausted = false;

  constructor(delays: Iterable<number>) {
    this.iterator = delays[Symbol.iterator]();
  }

  next(): number {
    if (!this.exhausted) {
      const result = this.iterator.next();
      if (result.done) {
        this.exhausted = true;
      } else {
        this.last = DelaySchedule.validate(result.value);
      }
    }

    if (this.last === undefined) {
      throw new RetryMisuseError('empty_schedule', 'Delay schedule must yield at least one value');
    }

    return this.last;
  }

  private static validate(delayMs: number): number {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new RetryMisuseError(
        'invalid_delay',
        `Delays must be finite and non-negative, got ${delayMs}`,
        { delayMs }
      );
    }
    return delayMs;
  }
}
