/**
 * Structured logging utility.
 *
 * Outputs JSON-formatted lines on stderr, so tables and scripts printed on
 * stdout can be piped straight into another program.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(configured) ? configured : 'warn';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold()];
}

export function formatLog(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): string {
  const entry: LogEntry = {
    level,
    context,
    message,
    timestamp: new Date().toISOString(),
    ...extra,
  };
  return JSON.stringify(entry);
}

/**
 * Log an error message with context
 */
export function logError(context: string, error: unknown, extra?: Record<string, unknown>): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(formatLog('error', context, message, extra));
}

/**
 * Log a warning message with context
 */
export function logWarn(context: string, message: string, extra?: Record<string, unknown>): void {
  if (enabled('warn')) {
    console.error(formatLog('warn', context, message, extra));
  }
}

/**
 * Log an info message with context
 */
export function logInfo(context: string, message: string, extra?: Record<string, unknown>): void {
  if (enabled('info')) {
    console.error(formatLog('info', context, message, extra));
  }
}

/**
 * Log a debug message with context (never in production)
 */
export function logDebug(context: string, message: string, extra?: Record<string, unknown>): void {
  if (process.env.NODE_ENV !== 'production' && enabled('debug')) {
    console.error(formatLog('debug', context, message, extra));
  }
}
