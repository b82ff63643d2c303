export { Logger } from './logger.js';
export { LoggerFactory, type LoggingSettings } from './factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { formatJson, formatText } from './format.js';
export {
  LogLevel,
  LOG_LEVELS,
  LOG_FORMATS,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type FileTransportConfig,
  type ConsoleTransportConfig,
  type LogData,
} from './types.js';
