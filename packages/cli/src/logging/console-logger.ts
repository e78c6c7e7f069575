/**
 * @module @envstage/cli/logging/console-logger
 * Level-tagged diagnostic lines on stderr.
 */

import type { Writable } from 'node:stream';
import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { isLevelEnabled, normalizeFields } from '@envstage/core';
import type { LogFields, LogLevel, Logger } from '@envstage/core';

export interface ConsoleLoggerOptions {
  stream: Writable;
  level?: LogLevel;
  color?: boolean;
  fields?: LogFields;
}

const LEVEL_STYLES: Record<LogLevel, (chalk: ChalkInstance, text: string) => string> = {
  debug: (chalk, text) => chalk.gray(text),
  info: (chalk, text) => chalk.cyan(text),
  warn: (chalk, text) => chalk.yellow(text),
  error: (chalk, text) => chalk.red(text),
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const threshold = options.level ?? 'info';
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const base = options.fields ?? {};

  const write = (level: LogLevel, message: string, fields?: LogFields | Error) => {
    if (!isLevelEnabled(level, threshold)) {
      return;
    }
    const tag = LEVEL_STYLES[level](chalk, `[${level.toUpperCase()}]`);
    const rendered = formatFields({ ...base, ...normalizeFields(fields) });
    const suffix = rendered.length > 0 ? ` ${chalk.dim(rendered)}` : '';
    options.stream.write(`${tag} ${message}${suffix}\n`);
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (fields) => createConsoleLogger({ ...options, fields: { ...base, ...fields } }),
  };
}
