import { LogLevel, Logger, type LogEntry, type LogTransport } from '@retry-rounds/logging';

import type { Clock, Sleep } from '../types.js';

export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  public readonly entries: LogEntry[] = [];

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export function memoryLogger(): { logger: Logger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = new Logger({ component: 'retry', level: LogLevel.DEBUG, transports: [transport] });
  return { logger, transport };
}

/**
 * Manual clock whose sleep advances time instantly
 */
export class FakeTime {
  public now = 0;
  public readonly sleeps: number[] = [];

  readonly clock: Clock = () => this.now;

  readonly sleep: Sleep = async ms => {
    this.sleeps.push(ms);
    this.now += ms;
  };
}
