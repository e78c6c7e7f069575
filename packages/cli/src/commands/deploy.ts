/**
 * @module @envstage/cli/commands/deploy
 */

import { z } from 'zod';
import { OperationTracker, nodeFs, runDeployment } from '@envstage/core';
import type { IdeAutomation } from '@envstage/core';
import { loadSettings, resolveWorkspaceRoot } from '../config/load-settings.js';
import { CommandIdeAutomation } from '../ide/command-ide-automation.js';
import type { CliIO } from '../io.js';
import { TerminalPrompt } from '../prompt/terminal-prompt.js';
import type { ExitCode } from '../exit-codes.js';
import { createCommandContext, parseOptions, runReported, sharedOptionsSchema } from './shared.js';

export const deployOptionsSchema = sharedOptionsSchema.extend({
  environment: z.string().min(1),
  dryRun: z.boolean().default(false),
  startupProject: z.enum(['ask', 'yes', 'no']).default('ask'),
});

export type DeployOptions = z.output<typeof deployOptionsSchema>;

export async function runDeployCommand(rawOptions: unknown, io: CliIO): Promise<ExitCode> {
  const outputFlags = sharedOptionsSchema.pick({ json: true, verbose: true }).safeParse(rawOptions);
  const ctx = createCommandContext(io, outputFlags.success ? outputFlags.data : { json: false, verbose: false });

  return runReported(ctx, async () => {
    const options: DeployOptions = parseOptions(deployOptionsSchema, rawOptions);
    const { settings, workspaceBase, configPath } = await loadSettings({
      configPath: options.config,
      overrides: { domain: options.domain, drive: options.drive, workspaceBase: options.workspaceBase },
      homeDir: io.homeDir,
      cwd: io.cwd,
    });
    ctx.logger.debug('Loaded settings', { configPath, workspaceBase });

    const { command, args, commandTimeoutMs } = settings.startupProject;
    let ide: IdeAutomation | undefined;
    if (command) {
      ide = new CommandIdeAutomation({ command, args, timeoutMs: commandTimeoutMs, logger: ctx.logger });
    }

    const summary = await runDeployment(
      {
        project: options.project,
        environment: options.environment,
        serviceInstance: options.serviceInstance,
        workspaceRoot: resolveWorkspaceRoot(workspaceBase, options.workspace),
        dryRun: options.dryRun,
        startupProject: options.startupProject,
      },
      settings,
      {
        fs: nodeFs,
        logger: ctx.logger,
        tracker: new OperationTracker(),
        prompt: io.interactive && !options.json ? new TerminalPrompt({ input: io.stdin, output: io.stderr }) : undefined,
        ide,
        now: io.now,
      }
    );

    ctx.presenter.summary(summary);
  });
}
