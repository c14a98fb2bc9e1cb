/**
 * @canopy/core - Logging
 *
 * Structured logger abstraction. Core components never write to the
 * console themselves; they log through an ILogger scoped to a category.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Well-known log categories
 */
export const LogCategory = {
  DI: 'DI',
  Locator: 'LOCATOR',
  Builder: 'BUILDER',
  Bootstrap: 'BOOTSTRAP',
  Init: 'INIT',
  Validation: 'VALIDATION',
  Host: 'HOST',
} as const;

export type LogCategory = (typeof LogCategory)[keyof typeof LogCategory];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger honouring a minimum level
 */
export function createConsoleLogger(
  options: { minLevel?: LogLevel } = {},
): ILogger {
  const min = LEVEL_ORDER[options.minLevel ?? 'debug'];
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= min;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(message, ...args);
    },
  };
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = createConsoleLogger();

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Scope a logger to a category and an optional source
 *
 * @example
 * ```typescript
 * const log = withCategory(consoleLogger, LogCategory.Init, 'PhaseExecutionService');
 * log.info('Phase started');
 * // [INIT] (PhaseExecutionService) Phase started
 * ```
 */
export function withCategory(
  logger: ILogger,
  category: LogCategory | string,
  source?: string,
): ILogger {
  const prefix = source ? `[${category}] (${source}) ` : `[${category}] `;

  return {
    debug: (message, ...args) => logger.debug(prefix + message, ...args),
    info: (message, ...args) => logger.info(prefix + message, ...args),
    warn: (message, ...args) => logger.warn(prefix + message, ...args),
    error: (message, ...args) => logger.error(prefix + message, ...args),
  };
}
