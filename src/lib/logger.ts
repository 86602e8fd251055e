// Analyzer log lines go to stderr; stdout only lists the report files a run wrote.

enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

function getCurrentLogLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && explicit in LEVELS_BY_NAME) return LEVELS_BY_NAME[explicit];

  const env = process.env.NODE_ENV || 'development';
  if (env === 'test') return LogLevel.ERROR;
  if (env === 'production') return LogLevel.WARN;
  return LogLevel.INFO;
}

function formatLogEntry(level: LogLevel, message: string, context?: string): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? `[${context}] ` : '';
  return `${timestamp} ${LOG_LEVEL_NAMES[level]} ${contextStr}${message}`;
}

// Config layers and CLI meta pass through here before they are printed
export function sanitise(data: unknown): unknown {
  if (typeof data !== 'object' || data === null) {
    return data;
  }

  if (Array.isArray(data)) {
    return data.map(sanitise);
  }

  const sanitised: Record<string, unknown> = {};
  const sensitiveKeys = ['password', 'token', 'secret', 'apikey', 'auth'];

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some((k) => lowerKey.includes(k))) {
      sanitised[key] = '[REDACTED]';
    } else {
      sanitised[key] = sanitise(value);
    }
  }

  return sanitised;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>, context?: string): void {
  if (level < getCurrentLogLevel()) {
    return;
  }

  const formattedMessage = formatLogEntry(level, message, context);

  if (meta) {
    console.error(formattedMessage, sanitise(meta));
  } else {
    console.error(formattedMessage);
  }
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => log(LogLevel.DEBUG, message, meta, context),
    info: (message, meta) => log(LogLevel.INFO, message, meta, context),
    warn: (message, meta) => log(LogLevel.WARN, message, meta, context),
    error: (message, error, meta) => {
      const errorMeta = error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : { ...meta, error };
      log(LogLevel.ERROR, message, errorMeta, context);
    },
  };
}

export const logger = createLogger('exam-analyzer');
