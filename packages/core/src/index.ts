/**
 * @module @envstage/core
 *
 * Resolve a project and its per-environment deploy config, stage the
 * transformed config into the build output and align the project's copy
 * and debug-launch metadata.
 *
 * @example
 * ```typescript
 * import { parseDeploySettings, runDeployment } from '@envstage/core';
 *
 * const summary = await runDeployment(
 *   { project: 'Service', environment: 'DEV1', serviceInstance: 'Portfolio', workspaceRoot },
 *   parseDeploySettings({ domainSuffix: 'corp.local' })
 * );
 * ```
 */

// Types
export type {
  ProjectDescriptor,
  ServiceInstance,
  EnvironmentConfig,
  DeployRequest,
  StartupProjectMode,
  TargetConfigStatus,
  MetadataChange,
  MetadataChangeStatus,
  StartupProjectStatus,
  StartupProjectOutcome,
  DeploySummary,
} from './types.js';

// Errors
export {
  DeployError,
  NotFoundError,
  ProjectAmbiguousError,
  CorruptMetadataError,
  InvalidEncodingError,
  WriteFailureError,
  ExternalTimeoutError,
  ExternalFailureError,
  InvalidSettingsError,
  isDeployError,
  isNotFoundError,
  isKnownErrorCode,
  isFileNotFound,
  getErrorMessage,
} from './errors.js';
export type { DeployErrorCode, NotFoundArtifact, SerializedDeployError } from './errors.js';

// Logging
export { createNoopLogger, isLevelEnabled, normalizeFields, LOG_LEVEL_ORDER } from './logging.js';
export type { Logger, LogLevel, LogFields } from './logging.js';

// Settings
export { deploySettingsSchema, parseDeploySettings, formatZodIssues, computeHostname } from './settings.js';
export type {
  DeploySettings,
  DeploySettingsInput,
  DebugLaunchSettings,
  StartupProjectSettings,
  ProjectMatchPredicateConfig,
} from './settings.js';

// File system
export { nodeFs, writeWithBackup, backupPathFor, formatBackupTimestamp } from './io/fs.js';
export type { DirectoryEntry, FSLike, WriteWithBackupResult } from './io/fs.js';

// Operations
export { OperationTracker } from './operations/operation-tracker.js';
export type {
  Operation,
  OperationKind,
  TrackedOperation,
  TrackedOperationStatus,
} from './operations/operation-tracker.js';

// Resolvers
export { resolveProject, findProjectCandidates, assertWorkspaceRoot } from './resolvers/project-resolver.js';
export {
  resolveServiceInstance,
  resolveEnvironmentConfig,
  resolveTargetConfig,
  listEnvironments,
  deployDirectoryOf,
} from './resolvers/artifact-resolver.js';
export { pickUnique, createProjectPredicates } from './resolvers/match-predicates.js';
export type { MatchPredicate, MatchOutcome } from './resolvers/match-predicates.js';

// Transform
export {
  transformConfig,
  countDriveRoots,
  decodeConfigText,
  encodeConfigText,
  previewConfig,
} from './transform/config-transformer.js';
export type { TransformOptions, DecodedText } from './transform/config-transformer.js';

// Metadata
export { parseXmlDocument, serializeXmlDocument } from './metadata/xml-document.js';
export type { XmlDocument, XmlElement, XmlNode } from './metadata/xml-document.js';
export { ensureCopyDirective, findProjectItem } from './metadata/copy-directive.js';
export { ensureDebugLaunch, renderLaunchTemplate, findConditionedGroup } from './metadata/debug-launch.js';
export type { DebugLaunchValues, LaunchTemplateTokens } from './metadata/debug-launch.js';
export {
  loadProjectMetadata,
  updateCopyDirective,
  updateDebugLaunch,
  userSettingsPathFor,
} from './metadata/metadata-updater.js';

// Pipeline
export { runDeployment, buildDebugLaunchValues } from './pipeline/deploy-pipeline.js';
export type { DeployDependencies } from './pipeline/deploy-pipeline.js';
export { registerStartupProject } from './pipeline/startup-project.js';
export type { StartupPrompt, PromptOutcome, IdeAutomation } from './pipeline/startup-project.js';
