/**
 * @module @envstage/cli/ide/command-ide-automation
 * Sets the IDE startup project by running an external command.
 */

import * as path from 'node:path';
import { execa } from 'execa';
import { ExternalFailureError, ExternalTimeoutError, getErrorMessage } from '@envstage/core';
import type { IdeAutomation, Logger } from '@envstage/core';

const STEP = 'IDE startup project command';

export interface CommandIdeAutomationOptions {
  command: string;
  /** `{projectFile}` and `{projectDir}` are replaced per call. */
  args: string[];
  timeoutMs: number;
  cwd?: string;
  logger?: Logger;
}

export function renderCommandArgs(args: readonly string[], projectFile: string): string[] {
  const projectDir = path.dirname(projectFile);
  return args.map((arg) => arg.split('{projectFile}').join(projectFile).split('{projectDir}').join(projectDir));
}

function describeFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'shortMessage' in error && typeof error.shortMessage === 'string') {
    return error.shortMessage;
  }
  return getErrorMessage(error);
}

export class CommandIdeAutomation implements IdeAutomation {
  constructor(private readonly options: CommandIdeAutomationOptions) {}

  async setStartupProject(projectFile: string): Promise<void> {
    const { command, timeoutMs, cwd, logger } = this.options;
    const args = renderCommandArgs(this.options.args, projectFile);
    logger?.debug('Running IDE command', { command, args, timeoutMs });

    try {
      const result = await execa(command, args, { cwd, timeout: timeoutMs });
      logger?.debug('IDE command finished', { exitCode: result.exitCode });
    } catch (error: unknown) {
      if (error && typeof error === 'object' && 'timedOut' in error && error.timedOut) {
        throw new ExternalTimeoutError(STEP, timeoutMs);
      }
      throw new ExternalFailureError(STEP, describeFailure(error), error);
    }
  }
}
