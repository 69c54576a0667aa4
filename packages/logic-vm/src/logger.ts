import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createConsoleLogger(level: LogLevel = 'info', prefix = '[rulelogic]'): Logger {
  const enabled = (at: LogLevel) => SEVERITY[at] >= SEVERITY[level];
  return {
    debug(message, ...meta) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...meta);
    },
    warn(message, ...meta) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...meta);
    },
    error(message, ...meta) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...meta);
    },
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
