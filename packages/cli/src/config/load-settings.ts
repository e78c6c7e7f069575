/**
 * @module @envstage/cli/config/load-settings
 *
 * Settings come from built-in defaults, then a JSON file, then flags.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import {
  InvalidSettingsError,
  formatZodIssues,
  getErrorMessage,
  isFileNotFound,
  parseDeploySettings,
} from '@envstage/core';
import type { DeploySettings } from '@envstage/core';

export const DEFAULT_CONFIG_PATH = '~/.envstage/config.json';
export const DEFAULT_WORKSPACE_BASE = '~/source/workspaces';

const configFileSchema = z
  .object({
    workspaceBase: z.string().min(1).optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof configFileSchema>;

export interface SettingsOverrides {
  domain?: string;
  drive?: string;
  workspaceBase?: string;
}

export interface LoadSettingsOptions {
  /** Explicit config file; must exist. */
  configPath?: string;
  overrides?: SettingsOverrides;
  homeDir: string;
  cwd: string;
}

export interface LoadedSettings {
  settings: DeploySettings;
  workspaceBase: string;
  /** File the settings were read from, if any. */
  configPath?: string;
}

/**
 * Expand a leading `~` and resolve against `cwd`.
 */
export function expandPath(value: string, homeDir: string, cwd: string): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(homeDir, value.slice(2));
  }
  return path.resolve(cwd, value);
}

async function readConfigFile(filePath: string, required: boolean): Promise<ConfigFile | undefined> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (!required && isFileNotFound(error)) {
      return undefined;
    }
    throw new InvalidSettingsError(`Cannot read config file ${filePath}`, [getErrorMessage(error)]);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new InvalidSettingsError(`Config file ${filePath} is not valid JSON`, [getErrorMessage(error)]);
  }

  const result = configFileSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidSettingsError(`Invalid config file ${filePath}`, formatZodIssues(result.error));
  }
  return result.data;
}

export async function loadSettings(options: LoadSettingsOptions): Promise<LoadedSettings> {
  const { homeDir, cwd, overrides = {} } = options;
  const configPath = expandPath(options.configPath ?? DEFAULT_CONFIG_PATH, homeDir, cwd);
  const fileData = await readConfigFile(configPath, options.configPath !== undefined);

  const data: ConfigFile = fileData ?? {};
  const { workspaceBase: fileWorkspaceBase, ...fileSettings } = data;
  const merged: Record<string, unknown> = { ...fileSettings };
  if (overrides.domain !== undefined) {
    merged.domainSuffix = overrides.domain;
  }
  if (overrides.drive !== undefined) {
    merged.targetDrive = overrides.drive;
  }

  const workspaceBase = overrides.workspaceBase ?? fileWorkspaceBase ?? DEFAULT_WORKSPACE_BASE;

  return {
    settings: parseDeploySettings(merged),
    workspaceBase: expandPath(workspaceBase, homeDir, cwd),
    configPath: fileData ? configPath : undefined,
  };
}

/**
 * `<workspaceBase>/<selector>`; an absolute selector is used as is.
 */
export function resolveWorkspaceRoot(workspaceBase: string, selector: string): string {
  return path.resolve(workspaceBase, selector);
}
