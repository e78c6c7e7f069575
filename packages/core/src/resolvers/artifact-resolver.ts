/**
 * @module @envstage/core/resolvers/artifact-resolver
 * Locate deployment artifacts inside a resolved project directory.
 */

import * as path from 'node:path';
import { NotFoundError, isFileNotFound } from '../errors.js';
import type { FSLike } from '../io/fs.js';
import { isDirectory, isFile } from '../io/fs.js';
import type { DeploySettings } from '../settings.js';
import type { ServiceInstance } from '../types.js';
import { comparePaths, containsIgnoreCase, equalsIgnoreCase, findFiles, stem } from './file-search.js';
import { exactName, firstContaining, pickUnique } from './match-predicates.js';

const CONFIG_EXTENSION = '.config';

export function deployDirectoryOf(projectDir: string, settings: Pick<DeploySettings, 'deployDirectory'>): string {
  return path.join(projectDir, settings.deployDirectory);
}

async function listDirectories(fsLike: FSLike, dirPath: string): Promise<string[]> {
  try {
    const entries = await fsLike.readdir(dirPath);
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort(comparePaths);
  } catch (error) {
    if (isFileNotFound(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Exact folder name first (ignoring case), else the first folder in name
 * order that contains `name`.
 */
export async function resolveServiceInstance(
  fsLike: FSLike,
  projectDir: string,
  name: string,
  settings: Pick<DeploySettings, 'deployDirectory'>
): Promise<ServiceInstance> {
  const deployDir = deployDirectoryOf(projectDir, settings);
  if (!(await isDirectory(fsLike, deployDir))) {
    throw new NotFoundError('deploy-directory', settings.deployDirectory, projectDir);
  }

  const folders = (await listDirectories(fsLike, deployDir)).filter((folder) => containsIgnoreCase(folder, name));
  const identity = (folder: string) => folder;
  const { winner } = pickUnique(folders, [exactName(name, identity), firstContaining(name, identity)]);
  if (winner === undefined) {
    throw new NotFoundError('service-instance', name, deployDir);
  }

  return { requestedName: name, folderPath: path.join(deployDir, winner) };
}

/**
 * First `<environment>.config` below the instance folder, shallowest first.
 */
export async function resolveEnvironmentConfig(instanceFolder: string, environment: string): Promise<string> {
  const fileName = `${environment}${CONFIG_EXTENSION}`;
  const matches = await findFiles(instanceFolder, {
    pattern: `**/*${CONFIG_EXTENSION}`,
    useDefaultIgnore: false,
    filter: (basename) => equalsIgnoreCase(basename, fileName),
  });

  const [first] = matches;
  if (first === undefined) {
    throw new NotFoundError('environment-config', fileName, instanceFolder);
  }
  return first;
}

/**
 * Environment names available for an instance, one per distinct
 * `*.config` file name, in name order.
 */
export async function listEnvironments(instanceFolder: string): Promise<string[]> {
  const files = await findFiles(instanceFolder, {
    pattern: `**/*${CONFIG_EXTENSION}`,
    useDefaultIgnore: false,
  });

  const seen = new Map<string, string>();
  for (const file of files) {
    const environment = stem(file);
    const key = environment.toLowerCase();
    if (!seen.has(key)) {
      seen.set(key, environment);
    }
  }
  return [...seen.values()].sort(comparePaths);
}

/**
 * The build-output config file: directly in the project directory, else
 * the shallowest match below it. Dot-directories (the deploy area) and
 * build output are not searched.
 */
export async function resolveTargetConfig(
  fsLike: FSLike,
  projectDir: string,
  settings: Pick<DeploySettings, 'targetConfigFileName'>
): Promise<string> {
  const direct = path.join(projectDir, settings.targetConfigFileName);
  if (await isFile(fsLike, direct)) {
    return direct;
  }

  const matches = await findFiles(projectDir, {
    pattern: '**/*',
    filter: (basename) => equalsIgnoreCase(basename, settings.targetConfigFileName),
  });

  const [first] = matches;
  if (first === undefined) {
    throw new NotFoundError('target-config', settings.targetConfigFileName, projectDir);
  }
  return first;
}
