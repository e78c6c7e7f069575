/**
 * @module @envstage/core/io/fs
 * File-system seam used by the pipeline. Tests swap in a recording shim.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { WriteFailureError, isFileNotFound } from '../errors.js';

export interface DirectoryEntry {
  name: string;
  isDirectory(): boolean;
}

export interface FSLike {
  readFile(filePath: string): Promise<Buffer>;
  writeFile(filePath: string, data: string | Uint8Array): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  mkdir(dirPath: string, options?: { recursive?: boolean }): Promise<void>;
  stat(filePath: string): Promise<{ isFile(): boolean; isDirectory(): boolean }>;
  readdir(dirPath: string): Promise<DirectoryEntry[]>;
}

export const nodeFs: FSLike = {
  readFile: (filePath) => fs.readFile(filePath),
  writeFile: (filePath, data) => fs.writeFile(filePath, data),
  copyFile: (source, destination) => fs.copyFile(source, destination),
  async mkdir(dirPath, options) {
    await fs.mkdir(dirPath, options);
  },
  stat: (filePath) => fs.stat(filePath),
  readdir: (dirPath) => fs.readdir(dirPath, { withFileTypes: true }),
};

export async function isDirectory(fsLike: FSLike, dirPath: string): Promise<boolean> {
  try {
    return (await fsLike.stat(dirPath)).isDirectory();
  } catch (error) {
    if (isFileNotFound(error) || isNotADirectory(error)) {
      return false;
    }
    throw error;
  }
}

export async function isFile(fsLike: FSLike, filePath: string): Promise<boolean> {
  try {
    return (await fsLike.stat(filePath)).isFile();
  } catch (error) {
    if (isFileNotFound(error) || isNotADirectory(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Read a file, or undefined when it does not exist.
 */
export async function readFileIfExists(fsLike: FSLike, filePath: string): Promise<Buffer | undefined> {
  try {
    return await fsLike.readFile(filePath);
  } catch (error) {
    if (isFileNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * `yyyyMMddHHmmss` in local time.
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupPathFor(filePath: string, date: Date): string {
  return `${filePath}.${formatBackupTimestamp(date)}.bak`;
}

export interface WriteWithBackupResult {
  filePath: string;
  backupPath?: string;
}

/**
 * Copy the existing file aside, then overwrite it. Both steps surface as
 * WriteFailureError.
 */
export async function writeWithBackup(
  fsLike: FSLike,
  filePath: string,
  data: string | Uint8Array,
  now: Date
): Promise<WriteWithBackupResult> {
  let backupPath: string | undefined;

  if (await isFile(fsLike, filePath)) {
    backupPath = backupPathFor(filePath, now);
    try {
      await fsLike.copyFile(filePath, backupPath);
    } catch (error) {
      throw new WriteFailureError(backupPath, error);
    }
  }

  await writeFileChecked(fsLike, filePath, data);
  return { filePath, backupPath };
}

/**
 * Write a file, creating its directory, mapping errors to WriteFailureError.
 */
export async function writeFileChecked(
  fsLike: FSLike,
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  try {
    await fsLike.mkdir(path.dirname(filePath), { recursive: true });
    await fsLike.writeFile(filePath, data);
  } catch (error) {
    throw new WriteFailureError(filePath, error);
  }
}

function isNotADirectory(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOTDIR');
}
