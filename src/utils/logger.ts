// Log levels enum
export enum LogLevel {
  SILLY = 0,
  TRACE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  FATAL = 6,
}

// Helper function to get formatted timestamp
const getTimestamp = (): string => {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
};

export const parseLogLevel = (raw: string | undefined): LogLevel => {
  switch (raw?.trim().toLowerCase()) {
    case 'silly':
      return LogLevel.SILLY;
    case 'trace':
      return LogLevel.TRACE;
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
};

// Read on every call so LOG_LEVEL from .env takes effect after dotenv runs
const shouldLog = (level: LogLevel): boolean => level >= parseLogLevel(process.env.LOG_LEVEL);

type LogFn = (message: string, ...args: unknown[]) => void;

export type Logger = {
  silly: LogFn;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
};

// Records go to stdout, so every log line goes to stderr.
const emit = (level: LogLevel, tag: string, prefix: string, message: string, args: unknown[]) => {
  if (!shouldLog(level)) return;
  console.error(`${getTimestamp()} [${tag}] ${prefix}${message}`, ...args);
};

/**
 * Console-based logger with timestamps and level filtering.
 * `context` is prepended to every message, e.g. `createLogger('peer 10.0.0.1')`.
 */
export const createLogger = (context?: string): Logger => {
  const prefix = context ? `[${context}] ` : '';
  return {
    silly: (message, ...args) => emit(LogLevel.SILLY, 'SILLY', prefix, message, args),
    trace: (message, ...args) => emit(LogLevel.TRACE, 'TRACE', prefix, message, args),
    debug: (message, ...args) => emit(LogLevel.DEBUG, 'DEBUG', prefix, message, args),
    info: (message, ...args) => emit(LogLevel.INFO, 'INFO', prefix, message, args),
    warn: (message, ...args) => emit(LogLevel.WARN, 'WARN', prefix, message, args),
    error: (message, ...args) => emit(LogLevel.ERROR, 'ERROR', prefix, message, args),
    fatal: (message, ...args) => emit(LogLevel.FATAL, 'FATAL', prefix, message, args),
  };
};

// Export the logger instance
export const log = createLogger();
