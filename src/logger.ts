/**
 * Level-based logging to stderr
 *
 * Context values under secret-bearing keys are redacted before writing.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogFormat = 'console' | 'json';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'auth_token',
  'authtoken',
  'token',
  'password',
  'authorization',
]);

/**
 * Parse a level name (DEBUG, INFO, WARN, ERROR, SILENT), case-insensitive
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level !== undefined) {
    return level;
  }
  return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
}

/**
 * Redact secrets from a log context
 *
 * Walks nested objects and arrays; keys are matched case-insensitively.
 */
export function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    redacted[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(value);
  }
  return redacted;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return redactSensitive(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

type LevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_OF: Record<LevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Level gating and error folding shared by both formats
 */
abstract class LevelLogger implements Logger {
  readonly level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = resolveLevel(level);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error ? { error: error.message, stack: error.stack, ...context } : context);
  }

  protected abstract write(level: LevelName, message: string, context?: Record<string, unknown>): void;

  private emit(level: LevelName, message: string, context?: Record<string, unknown>): void {
    if (this.level <= LEVEL_OF[level]) {
      this.write(level, message, context && redactSensitive(context));
    }
  }
}

/**
 * Human-readable lines: `[ISO] LEVEL: message {context}`
 */
export class ConsoleLogger extends LevelLogger {
  protected write(level: LevelName, message: string, context?: Record<string, unknown>): void {
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${new Date().toISOString()}] ${level.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * One JSON object per line for log aggregation
 */
export class JsonLogger extends LevelLogger {
  protected write(level: LevelName, message: string, context?: Record<string, unknown>): void {
    console.error(JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...context }));
  }
}

/**
 * Create a logger for the configured output format
 */
export function createLogger(format: LogFormat, level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
