/**
 * Scoped console logger.
 *
 * Every line is prefixed with an ISO timestamp, the level and a `[scope]` tag,
 * and is dropped when below the process-wide level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

function formatPrefix(level: LogLevel, scope: string): string {
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] [${scope}]`;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => {
      if (shouldLog('debug')) console.debug(formatPrefix('debug', scope), ...args);
    },
    info: (...args) => {
      if (shouldLog('info')) console.info(formatPrefix('info', scope), ...args);
    },
    warn: (...args) => {
      if (shouldLog('warn')) console.warn(formatPrefix('warn', scope), ...args);
    },
    error: (...args) => {
      if (shouldLog('error')) console.error(formatPrefix('error', scope), ...args);
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
