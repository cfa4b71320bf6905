export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  isLogLevel,
  logRequest,
  logResponse,
  logError,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type ConsoleLoggerOptions,
} from './logging.js';
