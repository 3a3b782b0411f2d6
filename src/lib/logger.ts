/**
 * Pulse30 — Logger
 *
 * Structured logging utility.
 * Everything goes to stderr: stdout is reserved for the rendered report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.LOG_LEVEL;
let currentLevelNum = LOG_LEVELS[isLogLevel(envLevel) ? envLevel : 'info'];

/**
 * Change the minimum level at runtime (the CLI's --debug flag).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelNum = LOG_LEVELS[level];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  process.stderr.write(`${formatEntry(entry)}\n`);
}

function bind(defaultContext: LogContext): Logger {
  return {
    debug: (message, context) => log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) => log('info', message, { ...defaultContext, ...context }),
    warn: (message, context) => log('warn', message, { ...defaultContext, ...context }),
    error: (message, context) => log('error', message, { ...defaultContext, ...context }),
  };
}

/**
 * Logger interface.
 */
export const logger = {
  debug: (message: string, context?: LogContext) => log('debug', message, context),
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext) => log('error', message, context),

  /**
   * Create a child logger with default context.
   */
  child: (defaultContext: LogContext): Logger => bind(defaultContext),
};

/**
 * Convert any thrown value into a log-friendly message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
