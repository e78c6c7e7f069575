import { isDeployError } from '@envstage/core';
import type { DeployErrorCode } from '@envstage/core';

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  notFound: 2,
  corruptMetadata: 3,
  writeFailure: 4,
  invalidEncoding: 5,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const BY_ERROR_CODE: Partial<Record<DeployErrorCode, ExitCode>> = {
  WORKSPACE_NOT_FOUND: EXIT_CODES.notFound,
  PROJECT_NOT_FOUND: EXIT_CODES.notFound,
  PROJECT_AMBIGUOUS: EXIT_CODES.notFound,
  DEPLOY_DIRECTORY_NOT_FOUND: EXIT_CODES.notFound,
  SERVICE_INSTANCE_NOT_FOUND: EXIT_CODES.notFound,
  ENVIRONMENT_CONFIG_NOT_FOUND: EXIT_CODES.notFound,
  TARGET_CONFIG_NOT_FOUND: EXIT_CODES.notFound,
  CORRUPT_METADATA: EXIT_CODES.corruptMetadata,
  WRITE_FAILURE: EXIT_CODES.writeFailure,
  INVALID_ENCODING: EXIT_CODES.invalidEncoding,
  INVALID_SETTINGS: EXIT_CODES.usage,
};

export function exitCodeFor(error: unknown): ExitCode {
  if (isDeployError(error)) {
    return BY_ERROR_CODE[error.code] ?? EXIT_CODES.failure;
  }
  return EXIT_CODES.failure;
}
