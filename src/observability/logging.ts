/**
 * Request logging for the storage client
 * @module supabase-storage-client/observability/logging
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * `text` writes `storage <LEVEL> <message> key=value ...`; `json` writes one
 * object per line.
 */
export type LogFormat = 'text' | 'json';

export type LogContext = Record<string, unknown>;

export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface ConsoleLoggerOptions {
  /** @default 'info' */
  level?: LogLevel;
  /** @default 'text' */
  format?: LogFormat;
  /** Line sink, `console.log` by default */
  write?: (line: string) => void;
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Logger writing one line per entry. Context fields that are undefined are
 * left out.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ level: 'debug' });
 * logger.debug('Incoming response', { method: 'GET', path: '/bucket', status: 200 });
 * // storage DEBUG Incoming response method=GET path=/bucket status=200
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly format: LogFormat;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.format = options.format ?? 'text';
    this.write = options.write ?? ((line) => console.log(line));
  }

  trace(message: string, context?: LogContext): void {
    this.emit('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  private emit(level: LogLevel, message: string, context: LogContext = {}): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const fields = Object.entries(context).filter(([, value]) => value !== undefined);

    if (this.format === 'json') {
      this.write(JSON.stringify({ level, message, ...Object.fromEntries(fields) }));
      return;
    }

    const pairs = fields.map(([key, value]) => `${key}=${formatValue(value)}`);
    this.write(['storage', level.toUpperCase(), message, ...pairs].join(' '));
  }
}

/**
 * Logger that discards everything; the client default
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _context?: LogContext): void {}
}

/**
 * Logs an outgoing storage request. Headers are never logged.
 */
export function logRequest(logger: Logger, method: string, path: string): void {
  logger.debug('Outgoing request', { method, path });
}

export function logResponse(
  logger: Logger,
  method: string,
  path: string,
  status: number,
  durationMs: number
): void {
  logger.debug('Incoming response', { method, path, status, durationMs });
}

/**
 * Logs a failed request. `context` names the request, e.g. `GET /bucket`.
 */
export function logError(logger: Logger, error: Error, context: string): void {
  logger.error('Request failed', {
    request: context,
    errorName: error.name,
    errorMessage: error.message,
  });
}
