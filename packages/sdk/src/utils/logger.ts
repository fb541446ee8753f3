/**
 * Minimal leveled logger used throughout the SDK.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[ownergate]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

function format(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return `${PREFIX} ${message}`;
  }
  return `${PREFIX} ${message} ${JSON.stringify(context)}`;
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format(message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format(message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format(message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      const ctx = error ? { ...context, error: error.message } : context;
      console.error(format(message, ctx));
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
