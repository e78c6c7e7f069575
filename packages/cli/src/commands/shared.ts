import { z } from 'zod';
import { InvalidSettingsError, formatZodIssues } from '@envstage/core';
import type { Logger } from '@envstage/core';
import type { CliIO } from '../io.js';
import { createConsoleLogger } from '../logging/console-logger.js';
import { TTYPresenter } from '../presenter/tty-presenter.js';
import { EXIT_CODES, exitCodeFor } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';

export const sharedOptionsSchema = z.object({
  project: z.string().min(1),
  serviceInstance: z.string().min(1),
  workspace: z.string().min(1),
  json: z.boolean().default(false),
  config: z.string().min(1).optional(),
  domain: z.string().min(1).optional(),
  drive: z.string().min(1).optional(),
  workspaceBase: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type SharedOptions = z.output<typeof sharedOptionsSchema>;

/**
 * @throws InvalidSettingsError when commander handed over something the schema rejects
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSettingsError('Invalid command options', formatZodIssues(result.error));
  }
  return result.data;
}

export interface CommandContext {
  io: CliIO;
  logger: Logger;
  presenter: TTYPresenter;
}

export function createCommandContext(io: CliIO, options: { json: boolean; verbose: boolean }): CommandContext {
  return {
    io,
    logger: createConsoleLogger({
      stream: io.stderr,
      level: options.verbose ? 'debug' : options.json ? 'warn' : 'info',
      color: io.color.stderr,
    }),
    presenter: new TTYPresenter({
      stdout: io.stdout,
      stderr: io.stderr,
      structured: options.json,
      color: io.color.stdout,
    }),
  };
}

/**
 * Run a command body, reporting any error through the presenter.
 */
export async function runReported(
  ctx: CommandContext,
  body: () => Promise<void>
): Promise<ExitCode> {
  try {
    await body();
    return EXIT_CODES.ok;
  } catch (error) {
    ctx.presenter.error(error);
    if (error instanceof Error && error.stack) {
      ctx.logger.debug('Command failed', { stack: error.stack });
    }
    return exitCodeFor(error);
  }
}
