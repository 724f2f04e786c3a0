/**
 * Trendwire — Logger
 *
 * Structured logging utility.
 * JSON lines in production, a compact readable line otherwise.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

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
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Read at call time so tests and the CLI can change it after import
function currentLevelNum(): number {
  const level = process.env.LOG_LEVEL ?? 'info';
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum();
}

export function formatEntry(entry: LogEntry, json = process.env.NODE_ENV === 'production'): string {
  if (json) {
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

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext): LogContext | undefined =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (childContext) => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger();

/**
 * Describe an unknown thrown value for a log context.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Performance timing utility.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  sink: Logger = logger
): Promise<T> {
  const start = performance.now();
  try {
    return await operation();
  } finally {
    sink.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
