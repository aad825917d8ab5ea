/**
 * Leveled console logger for @trustlens/runtime.
 *
 * Lines are formatted as `<timestamp> <LEVEL> <prefix> <message>`. Child
 * loggers share the parent's level and append a scope to the prefix, which
 * is how per-audit log lines are tagged.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVEL_NAMES: ReadonlySet<string> = new Set(Object.keys(LOG_LEVELS));

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
  /** Derive a logger whose prefix is extended with `[scope]`. */
  child(scope: string): Logger;
}

interface LevelRef {
  current: number;
}

function buildLogger(levelRef: LevelRef, prefix: string): Logger {
  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] < levelRef.current) {
      return;
    }
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(fullMessage, ...args);
        break;
      case 'info':
        console.info(fullMessage, ...args);
        break;
      case 'warn':
        console.warn(fullMessage, ...args);
        break;
      case 'error':
        console.error(fullMessage, ...args);
        break;
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      levelRef.current = LOG_LEVELS[level];
    },
    child: (scope) => buildLogger(levelRef, `${prefix}[${scope}]`),
  };
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[TrustLens]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.child('audit:42').info('Scout finished');
 * // 2026-03-02T09:15:00.000Z INFO  [TrustLens][audit:42] Scout finished
 * ```
 */
export function createLogger(minLevel: LogLevel = 'info', prefix = '[TrustLens]'): Logger {
  return buildLogger({ current: LOG_LEVELS[minLevel] }, prefix);
}

/**
 * No-op logger. Default for every component that takes an optional logger.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
  child: () => silentLogger,
};
