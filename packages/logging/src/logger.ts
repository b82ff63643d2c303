import { describeError, toError } from '@retry-rounds/errors';

import { ConsoleTransport } from './transports/console-transport.js';
import {
  LogLevel,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
} from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level =
      typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Create a child logger sharing this logger's level and transports
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
    });
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log an error message. Any thrown value is accepted; non-Error values are
   * attached by their description.
   */
  error(message: string, error?: unknown, data?: LogData): void {
    if (error === undefined) {
      this.log(LogLevel.ERROR, message, data);
      return;
    }

    const errorData = error instanceof Error ? data : { ...data, error: describeError(error) };
    this.log(LogLevel.ERROR, message, errorData, toError(error));
  }

  setLevel(level: LogLevel | string): void {
    this.level = typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  /**
   * Close all transports, waiting for pending writes
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map(t => t.close?.()));
  }

  private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch(err => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }

  static parseLogLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }
}
