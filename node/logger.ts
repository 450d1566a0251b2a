import { ILogger } from './core/types';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

const RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

let currentLevel: LogLevel = 'info';

/** Process-wide level for every logger created by {@link createLogger}. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[currentLevel] && currentLevel !== 'off';
}

function stamp(scope: string): string {
  return `${new Date().toISOString()} [${scope}]`;
}

export function createLogger(scope = 'meshnode'): ILogger {
  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug(stamp(scope), ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) console.info(stamp(scope), ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn(stamp(scope), ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(stamp(scope), ...args);
    },
  };
}

/** Prefixes every line with a sub-scope, e.g. `[gossip]`. */
export function scoped(logger: ILogger, scope: string): ILogger {
  const tag = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => logger.debug(tag, ...args),
    info: (...args: unknown[]) => logger.info(tag, ...args),
    warn: (...args: unknown[]) => logger.warn(tag, ...args),
    error: (...args: unknown[]) => logger.error(tag, ...args),
  };
}

export const logger = createLogger();
