/**
 * Environment-aware console logger for the setup services
 * Stays quiet under test unless LOG_LEVEL asks for output
 */

import type { Env } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

/**
 * Lowest level that gets written, or 'silent'.
 * Accepts the upper-case names used in the persisted config ("INFO", "WARNING").
 */
export const resolveLogThreshold = (env: Env): LogLevel | 'silent' => {
  const configured = env.LOG_LEVEL?.trim().toLowerCase();
  if (configured === 'warning') return 'warn';
  if (configured && isLogLevel(configured)) return configured;
  if (env.NODE_ENV === 'test') return 'silent';
  return 'info';
};

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Create a logger whose lines are prefixed with `[scope]`.
 * The threshold is read on every call so LOG_LEVEL changes apply immediately.
 */
export function createLogger(scope: string, env: Env = process.env): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    const threshold = resolveLogThreshold(env);
    if (threshold === 'silent' || LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const line = `[${scope}] ${message}`;
    if (data === undefined) {
      CONSOLE_METHODS[level](line);
    } else {
      CONSOLE_METHODS[level](line, data);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}
