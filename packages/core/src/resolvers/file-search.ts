/**
 * @module @envstage/core/resolvers/file-search
 * Deterministic directory scans on top of glob.
 */

import * as path from 'node:path';
import { glob } from 'glob';

const DEFAULT_IGNORE = ['**/node_modules/**', '**/bin/**', '**/obj/**'];

export interface FindFilesOptions {
  /** Glob relative to `cwd`. */
  pattern: string;
  /** Extra ignore globs, merged with the defaults when `useDefaultIgnore`. */
  ignore?: string[];
  useDefaultIgnore?: boolean;
  /** Keep only files whose basename passes. */
  filter?: (basename: string) => boolean;
}

/**
 * Find files under `cwd`, sorted by depth, then ordinal path. Returns
 * absolute paths.
 */
export async function findFiles(cwd: string, options: FindFilesOptions): Promise<string[]> {
  const ignore = [
    ...(options.useDefaultIgnore === false ? [] : DEFAULT_IGNORE),
    ...(options.ignore ?? []),
  ];

  const matches = await glob(options.pattern, {
    cwd,
    absolute: true,
    nodir: true,
    nocase: true,
    ignore,
  });

  const { filter } = options;
  const filtered = filter ? matches.filter((file) => filter(path.basename(file))) : matches;

  return sortByDepth(filtered);
}

export function pathDepth(filePath: string): number {
  return path.normalize(filePath).split(/[\\/]/).filter((segment) => segment.length > 0).length;
}

export function comparePaths(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function sortByDepth(paths: readonly string[]): string[] {
  return [...paths].sort((a, b) => pathDepth(a) - pathDepth(b) || comparePaths(a, b));
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/**
 * Basename without its last extension.
 */
export function stem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}
