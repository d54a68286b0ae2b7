/**
 * Console logger with component prefixes
 *
 * Every line is written as `[Component] message`. Output below the active
 * level is dropped; `silent` drops everything.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let activeLevel: LogLevel = 'info';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function enabled(level: LogLevel): boolean {
  return severity[level] >= severity[activeLevel];
}

/**
 * Create a logger whose lines carry `[prefix]`
 */
export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${tag} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`${tag} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${tag} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${tag} ${message}`, ...args);
    }
  };
}
