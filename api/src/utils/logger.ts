/**
 * Structured Logger
 *
 * JSON-formatted logging with levels: debug, info, warn, error
 *
 * - Debug logs only emit when LOG_LEVEL=debug or NODE_ENV !== 'production'
 * - All output is JSON for machine parsing in production
 * - child() binds fields (sessionId, turnId) onto every entry
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, bindings: LogContext, context?: LogContext) {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
    ...bindings,
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export function createLogger(bindings: LogContext = {}): Logger {
  return {
    debug(message, context) {
      if (!shouldLog('debug')) return;
      console.debug(formatEntry('debug', message, bindings, context));
    },

    info(message, context) {
      if (!shouldLog('info')) return;
      console.info(formatEntry('info', message, bindings, context));
    },

    warn(message, context) {
      if (!shouldLog('warn')) return;
      console.warn(formatEntry('warn', message, bindings, context));
    },

    error(message, context) {
      if (!shouldLog('error')) return;
      console.error(formatEntry('error', message, bindings, context));
    },

    child(childBindings) {
      return createLogger({ ...bindings, ...childBindings });
    },
  };
}

export const logger = createLogger();
