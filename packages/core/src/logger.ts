/**
 * Prefixed console logging. `debug` lines only print when STUDY_PLANNER_DEBUG
 * is set.
 */

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export const DEBUG_ENV = 'STUDY_PLANNER_DEBUG';

function debugEnabled(): boolean {
  const value = process.env[DEBUG_ENV];
  return value !== undefined && value !== '' && value !== '0';
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope.toUpperCase()}]:`;
  return {
    log: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
    debug: (...args) => {
      if (debugEnabled()) console.log(prefix, ...args);
    },
  };
}
