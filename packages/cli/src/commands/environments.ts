/**
 * @module @envstage/cli/commands/environments
 * List the environments a service instance has configs for.
 */

import * as path from 'node:path';
import {
  assertWorkspaceRoot,
  listEnvironments,
  nodeFs,
  resolveProject,
  resolveServiceInstance,
} from '@envstage/core';
import { loadSettings, resolveWorkspaceRoot } from '../config/load-settings.js';
import type { CliIO } from '../io.js';
import type { ExitCode } from '../exit-codes.js';
import { createCommandContext, parseOptions, runReported, sharedOptionsSchema } from './shared.js';

export async function runEnvironmentsCommand(rawOptions: unknown, io: CliIO): Promise<ExitCode> {
  const outputFlags = sharedOptionsSchema.pick({ json: true, verbose: true }).safeParse(rawOptions);
  const ctx = createCommandContext(io, outputFlags.success ? outputFlags.data : { json: false, verbose: false });

  return runReported(ctx, async () => {
    const options = parseOptions(sharedOptionsSchema, rawOptions);
    const { settings, workspaceBase } = await loadSettings({
      configPath: options.config,
      overrides: { domain: options.domain, drive: options.drive, workspaceBase: options.workspaceBase },
      homeDir: io.homeDir,
      cwd: io.cwd,
    });

    const workspaceRoot = resolveWorkspaceRoot(workspaceBase, options.workspace);
    await assertWorkspaceRoot(nodeFs, workspaceRoot);
    const project = await resolveProject(workspaceRoot, options.project, settings, ctx.logger);
    const instance = await resolveServiceInstance(nodeFs, project.directory, options.serviceInstance, settings);

    ctx.presenter.environments({
      project: project.filePath,
      serviceInstance: path.basename(instance.folderPath),
      environments: await listEnvironments(instance.folderPath),
    });
  });
}
