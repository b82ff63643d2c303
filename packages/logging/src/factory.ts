import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LogLevel, type LogFormat, type LogTransport } from './types.js';

/**
 * Logging settings as they appear in configuration files
 */
export interface LoggingSettings {
  level: string;
  file?: string | undefined;
  format?: LogFormat | undefined;
  colors?: boolean | undefined;
  /** Rotation threshold in bytes */
  max_size?: number | undefined;
  backup_count?: number | undefined;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: LoggerFactory.normalizeLevel(level),
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * Create a logger with file transport only
   */
  static createFileLogger(
    component: string,
    filename: string,
    level: LogLevel | string = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level: LoggerFactory.normalizeLevel(level),
      transports: [new FileTransport({ filename, format: 'text' })],
    });
  }

  /**
   * Create a structured JSON logger writing to console and file
   */
  static createStructuredLogger(
    component: string,
    filename: string,
    level: LogLevel | string = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level: LoggerFactory.normalizeLevel(level),
      transports: [
        new ConsoleTransport({ format: 'json', colors: false }),
        new FileTransport({ filename, format: 'json' }),
      ],
    });
  }

  /**
   * Create a logger from the `logging` section of a configuration file
   */
  static fromConfig(component: string, settings: LoggingSettings): Logger {
    const format = settings.format ?? 'text';
    const transports: LogTransport[] = [
      new ConsoleTransport({ format, colors: settings.colors ?? format === 'text' }),
    ];

    if (settings.file) {
      transports.push(
        new FileTransport({
          filename: settings.file,
          format,
          ...(settings.max_size !== undefined && { maxSizeBytes: settings.max_size }),
          ...(settings.backup_count !== undefined && { maxFiles: settings.backup_count }),
        })
      );
    }

    return new Logger({
      component,
      level: LoggerFactory.normalizeLevel(settings.level),
      transports,
    });
  }

  private static normalizeLevel(level: LogLevel | string): LogLevel {
    return typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }
}
