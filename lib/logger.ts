/**
 * Structured Logging for Ticker Context
 *
 * Writes one JSON object per line to stdout/stderr so any log collector
 * can pick the entries up without a parser.
 */

import { TickerContextError, getErrorCode } from './errors';

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Configuration for logger
 */
export interface LoggerConfig {
  minLevel?: LogLevel;
  includeStackTrace?: boolean;
  redactKeys?: string[]; // Keys to redact from context (e.g., 'apiKey', 'api_token')
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  includeStackTrace: true,
  redactKeys: ['apiKey', 'apikey', 'api_key', 'api_token', 'password', 'secret', 'token'],
};

let config: LoggerConfig = DEFAULT_CONFIG;

/**
 * Configure logger settings
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Restore the default logger settings
 */
export function resetLogger(): void {
  config = DEFAULT_CONFIG;
}

function redactSensitiveData(
  context: LogContext,
  keysToRedact: string[]
): LogContext {
  const redacted = { ...context };

  for (const key of keysToRedact) {
    if (key in redacted) {
      redacted[key] = '[REDACTED]';
    }
  }

  return redacted;
}

function shouldLog(level: LogLevel): boolean {
  const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
  const minLevelIndex = levels.indexOf(config.minLevel || LogLevel.INFO);
  const currentLevelIndex = levels.indexOf(level);

  return currentLevelIndex >= minLevelIndex;
}

/**
 * Normalize anything thrown into an Error for logging
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Core logging function
 *
 * @param level - Log severity level
 * @param message - Human-readable log message
 * @param context - Additional context data (will be redacted for sensitive keys)
 * @param error - Error object (optional)
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): void {
  if (!shouldLog(level)) {
    return;
  }

  const safeContext = context
    ? redactSensitiveData(context, config.redactKeys || [])
    : undefined;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(safeContext && { context: safeContext }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(config.includeStackTrace && { stack: error.stack }),
        ...(error instanceof TickerContextError && { code: error.code }),
      },
    }),
  };

  const jsonLog = JSON.stringify(entry);

  if (level === LogLevel.ERROR) {
    console.error(jsonLog);
  } else if (level === LogLevel.WARN) {
    console.warn(jsonLog);
  } else {
    console.log(jsonLog);
  }
}

export function debug(message: string, context?: LogContext): void {
  log(LogLevel.DEBUG, message, context);
}

export function info(message: string, context?: LogContext): void {
  log(LogLevel.INFO, message, context);
}

export function warn(
  message: string,
  context?: LogContext,
  error?: Error
): void {
  log(LogLevel.WARN, message, context, error);
}

export function error(
  message: string,
  context?: LogContext,
  err?: Error
): void {
  log(LogLevel.ERROR, message, context, err);
}

/**
 * Log API call metrics
 */
export function logAPICall(
  service: string,
  operation: string,
  duration: number,
  success: boolean,
  context?: LogContext
): void {
  log(
    success ? LogLevel.INFO : LogLevel.WARN,
    `API call: ${service}.${operation}`,
    {
      service,
      operation,
      duration,
      success,
      ...context,
    }
  );
}

/**
 * Context lookup lifecycle events
 */
export function logContextStart(query: string, context?: LogContext): void {
  info('Context analysis started', {
    query,
    ...context,
  });
}

export function logContextComplete(
  symbol: string,
  duration: number,
  sentiment: string,
  context?: LogContext
): void {
  info('Context analysis completed', {
    symbol,
    duration,
    sentiment,
    ...context,
  });
}

export function logContextFailed(
  query: string,
  errorCode: string,
  context?: LogContext,
  err?: Error
): void {
  error('Context analysis failed, returning default record', {
    query,
    errorCode,
    ...context,
  }, err);
}

/**
 * Create a timing logger that automatically logs duration
 */
export class Timer {
  private startTime: number;

  constructor(
    private operation: string,
    private context?: LogContext
  ) {
    this.startTime = Date.now();
    debug(`${operation} started`, context);
  }

  /**
   * End timer and log duration
   */
  end(success: boolean = true, additionalContext?: LogContext): number {
    const duration = Date.now() - this.startTime;

    log(
      success ? LogLevel.INFO : LogLevel.WARN,
      `${this.operation} ${success ? 'completed' : 'failed'}`,
      {
        duration,
        success,
        ...this.context,
        ...additionalContext,
      }
    );

    return duration;
  }

  /**
   * End timer with error
   */
  endWithError(err: Error, additionalContext?: LogContext): number {
    const duration = Date.now() - this.startTime;

    error(`${this.operation} failed`, {
      duration,
      errorCode: getErrorCode(err),
      ...this.context,
      ...additionalContext,
    }, err);

    return duration;
  }
}

/**
 * Create a timer for an operation
 *
 * @example
 * const timer = createTimer('StockData getNews', { symbol: 'AAPL' });
 * try {
 *   const data = await fetchData();
 *   timer.end(true);
 * } catch (err) {
 *   timer.endWithError(toError(err));
 * }
 */
export function createTimer(
  operation: string,
  context?: LogContext
): Timer {
  return new Timer(operation, context);
}
