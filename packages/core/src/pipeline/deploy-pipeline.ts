/**
 * @module @envstage/core/pipeline/deploy-pipeline
 *
 * resolve → transform → write target config → update metadata → startup
 * project. Nothing is written until every resolution step and both
 * metadata parses have succeeded.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { InvalidSettingsError, getErrorMessage } from '../errors.js';
import type { FSLike } from '../io/fs.js';
import { nodeFs, writeWithBackup } from '../io/fs.js';
import type { Logger } from '../logging.js';
import { createNoopLogger } from '../logging.js';
import type { DebugLaunchValues, LaunchTemplateTokens } from '../metadata/debug-launch.js';
import { renderLaunchTemplate } from '../metadata/debug-launch.js';
import { loadProjectMetadata, updateCopyDirective, updateDebugLaunch } from '../metadata/metadata-updater.js';
import { OperationTracker } from '../operations/operation-tracker.js';
import {
  resolveEnvironmentConfig,
  resolveServiceInstance,
  resolveTargetConfig,
} from '../resolvers/artifact-resolver.js';
import { assertWorkspaceRoot, resolveProject } from '../resolvers/project-resolver.js';
import type { DeploySettings } from '../settings.js';
import { computeHostname, formatZodIssues } from '../settings.js';
import { decodeConfigText, encodeConfigText, previewConfig, transformConfig } from '../transform/config-transformer.js';
import type {
  DeployRequest,
  DeploySummary,
  EnvironmentConfig,
  StartupProjectOutcome,
  TargetConfigStatus,
} from '../types.js';
import type { IdeAutomation, StartupPrompt } from './startup-project.js';
import { registerStartupProject } from './startup-project.js';

const NAME_PATTERN = /^[^\\/:*?"<>|]+$/;

const deployRequestSchema = z.object({
  project: z.string().trim().min(1).regex(NAME_PATTERN, 'must not contain path characters'),
  environment: z.string().trim().min(1).regex(NAME_PATTERN, 'must not contain path characters'),
  serviceInstance: z.string().trim().min(1).regex(NAME_PATTERN, 'must not contain path characters'),
  workspaceRoot: z.string().min(1),
  dryRun: z.boolean().default(false),
  startupProject: z.enum(['ask', 'yes', 'no']).default('ask'),
});

export interface DeployDependencies {
  fs?: FSLike;
  logger?: Logger;
  tracker?: OperationTracker;
  prompt?: StartupPrompt;
  ide?: IdeAutomation;
  now?: () => Date;
}

function validateRequest(request: DeployRequest, settings: DeploySettings): z.output<typeof deployRequestSchema> {
  const result = deployRequestSchema.safeParse(request);
  if (!result.success) {
    throw new InvalidSettingsError('Invalid deploy request', formatZodIssues(result.error));
  }
  const placeholder = settings.hostnamePlaceholder.toLowerCase();
  if (result.data.environment.toLowerCase().includes(placeholder)) {
    throw new InvalidSettingsError('Invalid deploy request', [
      `environment: must not contain the hostname placeholder '${settings.hostnamePlaceholder}'`,
    ]);
  }
  return result.data;
}

export async function runDeployment(
  request: DeployRequest,
  settings: DeploySettings,
  deps: DeployDependencies = {}
): Promise<DeploySummary> {
  const input = validateRequest(request, settings);
  const fsLike = deps.fs ?? nodeFs;
  const tracker = deps.tracker ?? new OperationTracker();
  const now = deps.now ?? (() => new Date());
  const logger = (deps.logger ?? createNoopLogger()).child({
    project: input.project,
    environment: input.environment,
    serviceInstance: input.serviceInstance,
  });
  const warnings: string[] = [];

  // Resolution. Any failure here aborts before a single write.
  const workspaceRoot = path.resolve(input.workspaceRoot);
  await assertWorkspaceRoot(fsLike, workspaceRoot);
  const project = await resolveProject(workspaceRoot, input.project, settings, logger);
  if (project.candidates.length > 1) {
    warnings.push(
      `Pattern '${input.project}' matched ${project.candidates.length} projects; using ${project.filePath} (${project.matchedBy})`
    );
  }
  const instance = await resolveServiceInstance(fsLike, project.directory, input.serviceInstance, settings);
  const sourceFile = await resolveEnvironmentConfig(instance.folderPath, input.environment);
  const targetPath = await resolveTargetConfig(fsLike, project.directory, settings);
  logger.info('Resolved deployment artifacts', {
    projectFile: project.filePath,
    instanceFolder: instance.folderPath,
    sourceFile,
    targetPath,
  });

  const hostname = computeHostname(input.environment, settings);
  const decoded = decodeConfigText(await fsLike.readFile(sourceFile), sourceFile);
  const config: EnvironmentConfig = {
    environment: input.environment,
    sourceFile,
    rawContent: decoded.text,
    transformedContent: transformConfig(decoded.text, {
      environment: input.environment,
      domainSuffix: settings.domainSuffix,
      targetDrive: settings.targetDrive,
      hostnamePlaceholder: settings.hostnamePlaceholder,
    }),
    hasBom: decoded.hasBom,
  };

  const metadata = await loadProjectMetadata(fsLike, project.filePath);

  // Writes.
  const staged = encodeConfigText(config.transformedContent, config.hasBom);
  const current = await fsLike.readFile(targetPath);
  let targetStatus: TargetConfigStatus;
  let backupPath: string | undefined;

  if (current.equals(staged)) {
    targetStatus = 'unchanged';
    tracker.track(
      { kind: 'write-config', description: `Stage ${input.environment} config`, path: targetPath },
      { status: 'skipped', reason: 'no-op' }
    );
  } else if (input.dryRun) {
    targetStatus = 'would-write';
    tracker.track(
      { kind: 'write-config', description: `Stage ${input.environment} config`, path: targetPath },
      { status: 'skipped', reason: 'dry-run' }
    );
  } else {
    const id = tracker.track({
      kind: 'write-config',
      description: `Stage ${input.environment} config`,
      path: targetPath,
    });
    try {
      const written = await writeWithBackup(fsLike, targetPath, staged, now());
      backupPath = written.backupPath;
      if (backupPath) {
        tracker.track(
          { kind: 'backup', description: 'Back up target config', path: backupPath },
          { status: 'applied' }
        );
      }
      tracker.markApplied(id);
    } catch (error) {
      tracker.markFailed(id, getErrorMessage(error));
      throw error;
    }
    targetStatus = 'written';
    logger.info('Staged environment config', { targetPath, backupPath });
  }

  const updateCtx = { fs: fsLike, tracker, logger, dryRun: input.dryRun };
  const copyDirective = await updateCopyDirective(
    metadata,
    path.basename(targetPath),
    settings.copyToOutput,
    updateCtx
  );
  const launchValues = buildDebugLaunchValues(settings, {
    environment: input.environment,
    hostname,
    serviceInstance: path.basename(instance.folderPath),
    project: project.name,
    targetDrive: settings.targetDrive,
  });
  const debugLaunch = await updateDebugLaunch(metadata, launchValues, updateCtx);

  for (const change of [copyDirective, debugLaunch]) {
    if (change.status === 'failed' || change.status === 'not-registered') {
      warnings.push(change.message ?? `${change.filePath}: ${change.status}`);
    }
  }

  const startupProject: StartupProjectOutcome = input.dryRun
    ? { status: 'skipped', message: 'dry run' }
    : await registerStartupProject(input.startupProject, project.filePath, settings.startupProject.promptTimeoutMs, {
        prompt: deps.prompt,
        ide: deps.ide,
        tracker,
        logger,
      });
  if (startupProject.status === 'failed' || startupProject.status === 'timed-out') {
    warnings.push(`Startup project: ${startupProject.message ?? startupProject.status}`);
  }

  return {
    dryRun: input.dryRun,
    workspaceRoot,
    project: {
      name: project.name,
      filePath: project.filePath,
      directory: project.directory,
      matchedBy: project.matchedBy,
    },
    serviceInstance: instance,
    environment: { name: input.environment, sourceFile },
    hostname,
    targetConfig: { path: targetPath, status: targetStatus, backupPath },
    preview: input.dryRun ? previewConfig(config.transformedContent, settings.previewLength) : undefined,
    metadata: { copyDirective, debugLaunch },
    startupProject,
    warnings,
    operations: tracker.toArray(),
  };
}

export function buildDebugLaunchValues(
  settings: DeploySettings,
  tokens: LaunchTemplateTokens
): DebugLaunchValues {
  const { debugLaunch } = settings;
  return {
    configuration: debugLaunch.configuration,
    platform: debugLaunch.platform,
    startAction: debugLaunch.startAction,
    startProgram: renderLaunchTemplate(debugLaunch.startProgram, tokens),
    startArguments: renderLaunchTemplate(debugLaunch.startArguments, tokens),
  };
}
