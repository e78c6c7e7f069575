import { describe, it, expect } from 'vitest';
import {
  CorruptMetadataError,
  DeployError,
  ExternalTimeoutError,
  NotFoundError,
  WriteFailureError,
  getErrorMessage,
  isDeployError,
  isKnownErrorCode,
  isNotFoundError,
} from '../errors.js';

describe('NotFoundError', () => {
  it('names the artifact, the query and where it looked', () => {
    const error = new NotFoundError('service-instance', 'Billing', '/w/Svc/.Deploy');

    expect(error.message).toBe("Service instance not found: 'Billing' (searched /w/Svc/.Deploy)");
    expect(error.code).toBe('SERVICE_INSTANCE_NOT_FOUND');
    expect(error.toJSON()).toEqual({
      name: 'NotFoundError',
      message: error.message,
      code: 'SERVICE_INSTANCE_NOT_FOUND',
      details: { artifact: 'service-instance', query: 'Billing', searchPath: '/w/Svc/.Deploy' },
    });
  });

  it('is distinguishable per artifact', () => {
    const error = new NotFoundError('environment-config', 'UAT.config', '/w/i');

    expect(isNotFoundError(error)).toBe(true);
    expect(isNotFoundError(error, 'environment-config')).toBe(true);
    expect(isNotFoundError(error, 'service-instance')).toBe(false);
    expect(isDeployError(error)).toBe(true);
  });
});

describe('other errors', () => {
  it('includes the line of corrupt metadata when known', () => {
    expect(new CorruptMetadataError('a.csproj', 'Unexpected end', 3).message).toBe(
      'Corrupt project metadata in a.csproj (line 3): Unexpected end'
    );
  });

  it('keeps the errno and cause of a write failure', () => {
    const cause = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const error = new WriteFailureError('/w/App.config', cause);

    expect(error.message).toBe('Failed to write /w/App.config: EACCES: permission denied');
    expect(error.details).toEqual({ filePath: '/w/App.config', errno: 'EACCES' });
    expect(error.cause).toBe(cause);
  });

  it('describes timeouts', () => {
    expect(new ExternalTimeoutError('Startup prompt', 500).message).toBe('Startup prompt timed out after 500ms');
  });

  it('defaults to UNKNOWN_ERROR', () => {
    expect(new DeployError('boom').code).toBe('UNKNOWN_ERROR');
  });
});

describe('helpers', () => {
  it('recognizes known codes', () => {
    expect(isKnownErrorCode('PROJECT_AMBIGUOUS')).toBe(true);
    expect(isKnownErrorCode('NOPE')).toBe(false);
    expect(isKnownErrorCode(42)).toBe(false);
  });

  it('gets a message from anything thrown', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
