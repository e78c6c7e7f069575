/**
 * @module @envstage/core/types
 */

import type { TrackedOperation } from './operations/operation-tracker.js';

export interface ProjectDescriptor {
  /** Project file stem, e.g. `Kernel.Service`. */
  readonly name: string;
  /** Loose pattern the caller asked for. */
  readonly pattern: string;
  readonly filePath: string;
  readonly directory: string;
  /** Predicate that picked this project among several candidates. */
  readonly matchedBy: string;
  readonly candidates: readonly string[];
}

export interface ServiceInstance {
  readonly requestedName: string;
  readonly folderPath: string;
}

export interface EnvironmentConfig {
  readonly environment: string;
  readonly sourceFile: string;
  readonly rawContent: string;
  readonly transformedContent: string;
  readonly hasBom: boolean;
}

export interface DeployRequest {
  project: string;
  environment: string;
  serviceInstance: string;
  workspaceRoot: string;
  dryRun?: boolean;
  startupProject?: StartupProjectMode;
}

/** `ask` prompts, `yes`/`no` answer without prompting. */
export type StartupProjectMode = 'ask' | 'yes' | 'no';

export type TargetConfigStatus = 'written' | 'unchanged' | 'would-write';

export type MetadataChangeStatus =
  | 'updated'
  | 'unchanged'
  | 'would-update'
  | 'not-registered'
  | 'failed';

export interface MetadataChange {
  status: MetadataChangeStatus;
  filePath: string;
  /** Field names that differed from the desired value. */
  changedFields: string[];
  message?: string;
}

export type StartupProjectStatus = 'registered' | 'declined' | 'timed-out' | 'skipped' | 'failed';

export interface StartupProjectOutcome {
  status: StartupProjectStatus;
  message?: string;
}

export interface DeploySummary {
  dryRun: boolean;
  workspaceRoot: string;
  project: {
    name: string;
    filePath: string;
    directory: string;
    matchedBy: string;
  };
  serviceInstance: ServiceInstance;
  environment: {
    name: string;
    sourceFile: string;
  };
  hostname: string;
  targetConfig: {
    path: string;
    status: TargetConfigStatus;
    backupPath?: string;
  };
  /** Bounded prefix of the transformed config; dry-run only. */
  preview?: string;
  metadata: {
    copyDirective: MetadataChange;
    debugLaunch: MetadataChange;
  };
  startupProject: StartupProjectOutcome;
  warnings: string[];
  operations: TrackedOperation[];
}
