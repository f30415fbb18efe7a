/**
 * Namespaced console logger used by the renderer and the CLI.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Logger interface */
export interface Logger {
  namespace: string;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Messages below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Creates a namespaced logger writing one line per message:
 * `[timestamp] [LEVEL] [namespace] message {json}`.
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];

  const formatMessage = (level: LogLevel, message: string, data?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${namespace}]`;
    if (data) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    namespace,
    info(message, data) {
      if (enabled('info')) console.info(formatMessage('info', message, data));
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(formatMessage('warn', message, data));
    },
    error(message, data) {
      if (enabled('error')) console.error(formatMessage('error', message, data));
    },
    debug(message, data) {
      if (enabled('debug')) console.debug(formatMessage('debug', message, data));
    },
  };
}
