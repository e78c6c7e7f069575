/**
 * @module @envstage/core/pipeline/startup-project
 *
 * Optional step: offer to make the project the IDE's startup project.
 * Never fatal; every failure becomes a warning.
 */

import { ExternalTimeoutError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logging.js';
import type { OperationTracker } from '../operations/operation-tracker.js';
import type { StartupProjectMode, StartupProjectOutcome } from '../types.js';

export interface PromptOutcome {
  answer: boolean;
  /** The deadline passed and `answer` is the default. */
  timedOut: boolean;
}

/**
 * Yes/no question bounded by a timeout. Tests inject a pre-decided answer.
 */
export interface StartupPrompt {
  confirm(question: string, options: { timeoutMs: number; defaultAnswer: boolean }): Promise<PromptOutcome>;
}

/**
 * Talks to a running IDE, if there is one.
 */
export interface IdeAutomation {
  setStartupProject(projectFile: string): Promise<void>;
}

export interface StartupProjectContext {
  prompt?: StartupPrompt;
  ide?: IdeAutomation;
  tracker: OperationTracker;
  logger: Logger;
}

export async function registerStartupProject(
  mode: StartupProjectMode,
  projectFile: string,
  promptTimeoutMs: number,
  ctx: StartupProjectContext
): Promise<StartupProjectOutcome> {
  const description = `Set IDE startup project to ${projectFile}`;

  if (mode === 'no') {
    return { status: 'skipped', message: 'startup project registration disabled' };
  }

  if (mode === 'ask') {
    if (!ctx.prompt) {
      return { status: 'skipped', message: 'no interactive prompt available' };
    }
    const outcome = await ctx.prompt.confirm(`Make ${projectFile} the startup project?`, {
      timeoutMs: promptTimeoutMs,
      defaultAnswer: false,
    });
    if (outcome.timedOut) {
      ctx.tracker.track(
        { kind: 'startup-project', description, path: projectFile },
        { status: 'skipped', reason: 'prompt timed out' }
      );
      return { status: 'timed-out', message: `no answer within ${promptTimeoutMs}ms; assumed no` };
    }
    if (!outcome.answer) {
      ctx.tracker.track(
        { kind: 'startup-project', description, path: projectFile },
        { status: 'skipped', reason: 'declined' }
      );
      return { status: 'declined' };
    }
  }

  if (!ctx.ide) {
    return { status: 'skipped', message: 'no IDE automation configured' };
  }

  const id = ctx.tracker.track({ kind: 'startup-project', description, path: projectFile });
  try {
    await ctx.ide.setStartupProject(projectFile);
    ctx.tracker.markApplied(id);
    ctx.logger.info('Startup project registered', { projectFile });
    return { status: 'registered' };
  } catch (error) {
    const message = getErrorMessage(error);
    ctx.tracker.markFailed(id, message);
    ctx.logger.warn('Could not register startup project', { projectFile, error: message });
    return { status: error instanceof ExternalTimeoutError ? 'timed-out' : 'failed', message };
  }
}
