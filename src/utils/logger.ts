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

export type LogContext = Record<string, unknown>;

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

// Get current log level from environment variable
const getCurrentLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  switch (level) {
    case 'silly':
      return LogLevel.SILLY;
    case 'trace':
      return LogLevel.TRACE;
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO; // Default to INFO level
  }
};

// Helper function to check if a log level should be output
const shouldLog = (level: LogLevel): boolean => {
  return level >= getCurrentLogLevel();
};

// JSON.stringify drops an Error's fields and throws on a bigint
const contextReplacer = (_key: string, value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
};

export const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';
  try {
    return ` ${JSON.stringify(context, contextReplacer)}`;
  } catch {
    return ` ${String(context)}`;
  }
};

// stdout belongs to the publishers, so every level goes to stderr
const emit = (level: LogLevel, label: string, message: string, context?: LogContext): void => {
  if (!shouldLog(level)) return;
  process.stderr.write(`${getTimestamp()} [${label}] ${message}${formatContext(context)}\n`);
};

// Console-based logger with timestamps and level filtering
const createLogger = () => ({
  silly: (message: string, context?: LogContext) => emit(LogLevel.SILLY, 'SILLY', message, context),
  trace: (message: string, context?: LogContext) => emit(LogLevel.TRACE, 'TRACE', message, context),
  debug: (message: string, context?: LogContext) => emit(LogLevel.DEBUG, 'DEBUG', message, context),
  info: (message: string, context?: LogContext) => emit(LogLevel.INFO, 'INFO', message, context),
  warn: (message: string, context?: LogContext) => emit(LogLevel.WARN, 'WARN', message, context),
  error: (message: string, context?: LogContext) => emit(LogLevel.ERROR, 'ERROR', message, context),
  fatal: (message: string, context?: LogContext) => emit(LogLevel.FATAL, 'FATAL', message, context),
});

// Export the logger instance
export const log = createLogger();
