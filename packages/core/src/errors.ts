/**
 * @module @envstage/core/errors
 *
 * Error classes for the deployment pipeline.
 *
 * Resolution errors (NotFoundError, ProjectAmbiguousError) and
 * CorruptMetadataError abort the run. External errors are downgraded to
 * warnings by the pipeline.
 */

export type DeployErrorCode =
  | 'WORKSPACE_NOT_FOUND'
  | 'PROJECT_NOT_FOUND'
  | 'PROJECT_AMBIGUOUS'
  | 'DEPLOY_DIRECTORY_NOT_FOUND'
  | 'SERVICE_INSTANCE_NOT_FOUND'
  | 'ENVIRONMENT_CONFIG_NOT_FOUND'
  | 'TARGET_CONFIG_NOT_FOUND'
  | 'CORRUPT_METADATA'
  | 'INVALID_ENCODING'
  | 'WRITE_FAILURE'
  | 'EXTERNAL_TIMEOUT'
  | 'EXTERNAL_FAILURE'
  | 'INVALID_SETTINGS'
  | 'UNKNOWN_ERROR';

/**
 * Artifacts a NotFoundError can name. Each maps to its own error code so
 * callers can tell "no such instance" apart from "no such environment".
 */
export type NotFoundArtifact =
  | 'workspace-root'
  | 'project'
  | 'deploy-directory'
  | 'service-instance'
  | 'environment-config'
  | 'target-config';

const NOT_FOUND_CODES: Record<NotFoundArtifact, DeployErrorCode> = {
  'workspace-root': 'WORKSPACE_NOT_FOUND',
  project: 'PROJECT_NOT_FOUND',
  'deploy-directory': 'DEPLOY_DIRECTORY_NOT_FOUND',
  'service-instance': 'SERVICE_INSTANCE_NOT_FOUND',
  'environment-config': 'ENVIRONMENT_CONFIG_NOT_FOUND',
  'target-config': 'TARGET_CONFIG_NOT_FOUND',
};

const ARTIFACT_LABELS: Record<NotFoundArtifact, string> = {
  'workspace-root': 'Workspace root',
  project: 'Project',
  'deploy-directory': 'Deploy directory',
  'service-instance': 'Service instance',
  'environment-config': 'Environment config',
  'target-config': 'Target config file',
};

const KNOWN_ERROR_CODES: Set<string> = new Set<DeployErrorCode>([
  ...Object.values(NOT_FOUND_CODES),
  'PROJECT_AMBIGUOUS',
  'CORRUPT_METADATA',
  'INVALID_ENCODING',
  'WRITE_FAILURE',
  'EXTERNAL_TIMEOUT',
  'EXTERNAL_FAILURE',
  'INVALID_SETTINGS',
  'UNKNOWN_ERROR',
]);

/**
 * Type guard for DeployErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is DeployErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

export interface SerializedDeployError {
  name: string;
  message: string;
  code: DeployErrorCode;
  details?: Record<string, unknown>;
}

/**
 * Base pipeline error.
 */
export class DeployError extends Error {
  readonly code: DeployErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: DeployErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeployError';
    this.code = code;
    this.details = details;
  }

  toJSON(): SerializedDeployError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export function isDeployError(error: unknown): error is DeployError {
  return error instanceof DeployError;
}

/**
 * A resolution stage found nothing. Names the artifact, what was asked for
 * and where it looked.
 */
export class NotFoundError extends DeployError {
  readonly artifact: NotFoundArtifact;
  readonly query: string;
  readonly searchPath: string;

  constructor(artifact: NotFoundArtifact, query: string, searchPath: string) {
    super(
      `${ARTIFACT_LABELS[artifact]} not found: '${query}' (searched ${searchPath})`,
      NOT_FOUND_CODES[artifact],
      { artifact, query, searchPath }
    );
    this.name = 'NotFoundError';
    this.artifact = artifact;
    this.query = query;
    this.searchPath = searchPath;
  }
}

export function isNotFoundError(
  error: unknown,
  artifact?: NotFoundArtifact
): error is NotFoundError {
  return error instanceof NotFoundError && (artifact === undefined || error.artifact === artifact);
}

/**
 * Several projects matched and no match predicate picked one.
 */
export class ProjectAmbiguousError extends DeployError {
  readonly pattern: string;
  readonly candidates: string[];

  constructor(pattern: string, candidates: string[]) {
    super(
      `Project pattern '${pattern}' matches ${candidates.length} projects: ${candidates.join(', ')}`,
      'PROJECT_AMBIGUOUS',
      { pattern, candidates }
    );
    this.name = 'ProjectAmbiguousError';
    this.pattern = pattern;
    this.candidates = candidates;
  }
}

/**
 * A project or per-user settings document is not well-formed MSBuild XML.
 */
export class CorruptMetadataError extends DeployError {
  readonly filePath: string;
  readonly reason: string;

  constructor(filePath: string, reason: string, line?: number) {
    super(
      `Corrupt project metadata in ${filePath}${line !== undefined ? ` (line ${line})` : ''}: ${reason}`,
      'CORRUPT_METADATA',
      { filePath, reason, line }
    );
    this.name = 'CorruptMetadataError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

export class InvalidEncodingError extends DeployError {
  readonly filePath?: string;

  constructor(filePath?: string) {
    super(
      `Config text is not valid UTF-8${filePath ? `: ${filePath}` : ''}`,
      'INVALID_ENCODING',
      { filePath }
    );
    this.name = 'InvalidEncodingError';
    this.filePath = filePath;
  }
}

export class WriteFailureError extends DeployError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(
      `Failed to write ${filePath}: ${getErrorMessage(cause)}`,
      'WRITE_FAILURE',
      { filePath, errno: getErrnoCode(cause) },
      { cause }
    );
    this.name = 'WriteFailureError';
    this.filePath = filePath;
  }
}

/**
 * A bounded wait on an external step expired.
 */
export class ExternalTimeoutError extends DeployError {
  readonly step: string;
  readonly timeoutMs: number;

  constructor(step: string, timeoutMs: number) {
    super(`${step} timed out after ${timeoutMs}ms`, 'EXTERNAL_TIMEOUT', { step, timeoutMs });
    this.name = 'ExternalTimeoutError';
    this.step = step;
    this.timeoutMs = timeoutMs;
  }
}

export class ExternalFailureError extends DeployError {
  readonly step: string;

  constructor(step: string, reason: string, cause?: unknown) {
    super(`${step} failed: ${reason}`, 'EXTERNAL_FAILURE', { step, reason }, { cause });
    this.name = 'ExternalFailureError';
    this.step = step;
  }
}

export class InvalidSettingsError extends DeployError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_SETTINGS', {
      issues,
    });
    this.name = 'InvalidSettingsError';
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function getErrnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isFileNotFound(error: unknown): boolean {
  return getErrnoCode(error) === 'ENOENT';
}
