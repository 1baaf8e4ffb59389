/**
 * Tagged logger: structured logging with a per-service tag.
 *
 * Usage:
 *   const log = createLogger('SemanticMatcher');
 *   log.info('Indexed 120 behaviors');
 *   log.warn('Cache model mismatch', { stored: 'a', active: 'b' });
 *   log.error('Embedding failed', err);
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Global log level, set from config at bootstrap */
let globalLogLevel: LogLevel = 'info';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'KnowledgeGraph', 'QAService')
 */
export function createLogger(tag: string): Logger {
  const shouldLog = (level: LogLevel): boolean => LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];
  const prefix = (level: LogLevel): string => `${new Date().toISOString()} ${level.toUpperCase()} [${tag}]`;

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) {
        console.debug(prefix('debug'), message, ...args);
      }
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) {
        console.log(prefix('info'), message, ...args);
      }
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) {
        console.warn(prefix('warn'), message, ...args);
      }
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) {
        console.error(prefix('error'), message, ...args);
      }
    },
  };
}
