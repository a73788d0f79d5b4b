export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  /** Component that emitted the entry, e.g. `RemoteDataSyncEngine/app` */
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that embedders can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  /** Logger for a sub-component; its context is appended after a slash */
  child(context: string): Logger;
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Context name (e.g., 'RemoteDataSyncEngine') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Writes `<iso time> <LEVEL>[context] message {data}` lines to the console
 */
export function consoleLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const line = `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase()}${prefix} ${entry.message}${
    entry.data ? ` ${JSON.stringify(entry.data)}` : ''
  }`;

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, entry.error ?? '');
      break;
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) return undefined;
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = consoleLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug(message, data) {
      log('debug', message, data);
    },
    info(message, data) {
      log('info', message, data);
    },
    warn(message, data) {
      log('warn', message, data);
    },
    error(message, error, data) {
      log('error', message, data, toError(error));
    },
    child(childContext) {
      return createLogger({
        level,
        handler,
        enabled,
        context: context ? `${context}/${childContext}` : childContext,
      });
    },
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};

/**
 * Resolve the `logger` option accepted by the engine and its collaborators
 */
export function resolveLogger(option: LoggerOptions | Logger | false | undefined, context: string): Logger {
  if (option === false) {
    return noopLogger;
  }
  if (option && isLogger(option)) {
    return option.child(context);
  }
  return createLogger({ ...option, context });
}

function isLogger(value: LoggerOptions | Logger): value is Logger {
  return 'debug' in value && 'info' in value && 'child' in value;
}
