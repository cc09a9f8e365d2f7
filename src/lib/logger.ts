/**
 * News Reader — Logger
 *
 * Simple structured logging utility.
 * Logs are JSON-formatted in production for easy parsing.
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

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

let minLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

/**
 * Override the level read from LOG_LEVEL at startup.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

// JSON lines in production, `HH:MM:SS LEVEL message {context}` otherwise
function render(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') return JSON.stringify(entry);

  const { timestamp, level, message, context } = entry;
  const fields = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `${timestamp.slice(11, 19)} ${level.toUpperCase().padEnd(5)} ${message}${fields}`;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;
  WRITERS[level](render({ timestamp: new Date().toISOString(), level, message, context }));
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

function createLogger(defaultContext?: LogContext): Logger {
  const withDefaults = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, withDefaults(context)),
    info: (message, context) => log('info', message, withDefaults(context)),
    warn: (message, context) => log('warn', message, withDefaults(context)),
    error: (message, context) => log('error', message, withDefaults(context)),

    /**
     * Create a child logger with default context.
     */
    child: (context) => createLogger(withDefaults(context)),
  };
}

export const logger: Logger = createLogger();
