import { describe, it, expect } from 'vitest';
import { computeHostname, parseDeploySettings } from '../settings.js';
import { InvalidSettingsError } from '../errors.js';

describe('parseDeploySettings', () => {
  it('fills defaults', () => {
    const settings = parseDeploySettings();

    expect(settings).toMatchObject({
      domainSuffix: 'corp.local',
      hostnamePlaceholder: 'localhost',
      targetDrive: 'D',
      namespacePrefix: '',
      projectExtension: '.csproj',
      deployDirectory: '.Deploy',
      targetConfigFileName: 'App.config',
      copyToOutput: 'Always',
      previewLength: 400,
    });
    expect(settings.projectMatchOrder).toEqual([{ kind: 'exact' }, { kind: 'prefixed' }, { kind: 'shallowest' }]);
    expect(settings.debugLaunch.configuration).toBe('Debug');
    expect(settings.startupProject).toEqual({ promptTimeoutMs: 10_000, args: ['{projectFile}'], commandTimeoutMs: 30_000 });
  });

  it('upper-cases the drive letter', () => {
    expect(parseDeploySettings({ targetDrive: 'e' }).targetDrive).toBe('E');
  });

  it('lists every problem', () => {
    const error = (() => {
      try {
        parseDeploySettings({ targetDrive: 'DD', previewLength: 0 });
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InvalidSettingsError);
    expect(error).toMatchObject({
      code: 'INVALID_SETTINGS',
      issues: ['targetDrive: must be a single drive letter', 'previewLength: Number must be greater than 0'],
    });
  });

  it('rejects a domain that would reintroduce the placeholder', () => {
    expect(() => parseDeploySettings({ domainSuffix: 'localhost.corp' })).toThrow(
      "Invalid deployment settings: domainSuffix: must not contain the hostname placeholder 'localhost'"
    );
  });

  it('rejects unknown match predicates', () => {
    expect(() => parseDeploySettings({ projectMatchOrder: [{ kind: 'newest' }] })).toThrow(InvalidSettingsError);
  });
});

describe('computeHostname', () => {
  it('joins environment and domain', () => {
    expect(computeHostname('QA2', { domainSuffix: 'corp.local' })).toBe('QA2.corp.local');
  });
});
