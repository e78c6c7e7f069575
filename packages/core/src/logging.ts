/**
 * @module @envstage/core/logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields | Error): void;
  /**
   * Logger that adds `fields` to every entry.
   */
  child(fields: LogFields): Logger;
}

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[threshold];
}

/**
 * Flatten an Error passed in place of fields.
 */
export function normalizeFields(fields?: LogFields | Error): LogFields | undefined {
  if (fields instanceof Error) {
    return { error: fields.message, stack: fields.stack };
  }
  return fields;
}

export function createNoopLogger(): Logger {
  const logger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    child() {
      return logger;
    },
  };
  return logger;
}
