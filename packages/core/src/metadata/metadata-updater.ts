/**
 * @module @envstage/core/metadata/metadata-updater
 *
 * Read-modify-write over the project file and its per-user settings file.
 * Both documents are parsed by `loadProjectMetadata` before anything is
 * written, so a corrupt document aborts the run with nothing patched.
 */

import * as path from 'node:path';
import type { FSLike } from '../io/fs.js';
import { readFileIfExists, writeFileChecked } from '../io/fs.js';
import { CorruptMetadataError, InvalidEncodingError, NotFoundError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logging.js';
import type { OperationTracker } from '../operations/operation-tracker.js';
import type { DecodedText } from '../transform/config-transformer.js';
import { decodeConfigText, encodeConfigText } from '../transform/config-transformer.js';
import type { MetadataChange } from '../types.js';
import { ensureCopyDirective } from './copy-directive.js';
import type { DebugLaunchValues } from './debug-launch.js';
import { ensureDebugLaunch } from './debug-launch.js';
import type { XmlDocument } from './xml-document.js';
import { createProjectDocument, parseXmlDocument, serializeXmlDocument } from './xml-document.js';

export interface LoadedDocument {
  filePath: string;
  document: XmlDocument;
  hasBom: boolean;
  /** False when the file did not exist and `document` is a fresh one. */
  existed: boolean;
}

export interface ProjectMetadata {
  project: LoadedDocument;
  user: LoadedDocument;
}

export function userSettingsPathFor(projectFile: string): string {
  return `${projectFile}.user`;
}

async function loadDocument(fsLike: FSLike, filePath: string, required: boolean): Promise<LoadedDocument> {
  const bytes = await readFileIfExists(fsLike, filePath);
  if (bytes === undefined) {
    if (required) {
      throw new NotFoundError('project', path.basename(filePath), path.dirname(filePath));
    }
    return { filePath, document: createProjectDocument(), hasBom: true, existed: false };
  }

  let decoded: DecodedText;
  try {
    decoded = decodeConfigText(bytes, filePath);
  } catch (error) {
    if (error instanceof InvalidEncodingError) {
      throw new CorruptMetadataError(filePath, 'not valid UTF-8 text');
    }
    throw error;
  }
  const { text, hasBom } = decoded;
  return { filePath, document: parseXmlDocument(text, filePath), hasBom, existed: true };
}

/**
 * @throws CorruptMetadataError when either document fails to parse
 */
export async function loadProjectMetadata(fsLike: FSLike, projectFile: string): Promise<ProjectMetadata> {
  const project = await loadDocument(fsLike, projectFile, true);
  const user = await loadDocument(fsLike, userSettingsPathFor(projectFile), false);
  return { project, user };
}

export interface MetadataUpdateContext {
  fs: FSLike;
  tracker: OperationTracker;
  logger: Logger;
  dryRun: boolean;
}

async function persist(
  loaded: LoadedDocument,
  ctx: MetadataUpdateContext,
  description: string,
  changedFields: string[]
): Promise<MetadataChange> {
  if (ctx.dryRun) {
    ctx.tracker.track(
      { kind: 'metadata', description, path: loaded.filePath },
      { status: 'skipped', reason: 'dry-run' }
    );
    return { status: 'would-update', filePath: loaded.filePath, changedFields };
  }

  const id = ctx.tracker.track({ kind: 'metadata', description, path: loaded.filePath });
  try {
    const text = serializeXmlDocument(loaded.document);
    await writeFileChecked(ctx.fs, loaded.filePath, encodeConfigText(text, loaded.hasBom));
    ctx.tracker.markApplied(id);
    ctx.logger.info(description, { filePath: loaded.filePath, changedFields });
    return { status: 'updated', filePath: loaded.filePath, changedFields };
  } catch (error) {
    const message = getErrorMessage(error);
    ctx.tracker.markFailed(id, message);
    ctx.logger.warn(`${description} failed`, { filePath: loaded.filePath, error: message });
    return { status: 'failed', filePath: loaded.filePath, changedFields, message };
  }
}

/**
 * Ensure the target config item is copied to the output directory. Writes
 * the project file only when the directive changed.
 */
export async function updateCopyDirective(
  metadata: ProjectMetadata,
  targetFileName: string,
  copyValue: string,
  ctx: MetadataUpdateContext
): Promise<MetadataChange> {
  const { project } = metadata;
  const result = ensureCopyDirective(project.document, targetFileName, copyValue);

  switch (result.status) {
    case 'not-registered':
      ctx.logger.info('Target config is not an item of the project; copy directive left alone', {
        filePath: project.filePath,
        targetFileName,
      });
      return {
        status: 'not-registered',
        filePath: project.filePath,
        changedFields: [],
        message: `${targetFileName} is not listed in ${project.filePath}`,
      };
    case 'unchanged':
      ctx.tracker.track(
        { kind: 'metadata', description: `Copy directive for ${result.include}`, path: project.filePath },
        { status: 'skipped', reason: 'no-op' }
      );
      return { status: 'unchanged', filePath: project.filePath, changedFields: [] };
    case 'changed':
      return persist(project, ctx, `Set CopyToOutputDirectory=${copyValue} for ${result.include}`, [
        'CopyToOutputDirectory',
      ]);
  }
}

/**
 * Ensure the per-user debug launch settings. Creates the settings file when
 * missing; writes only when a field changed.
 */
export async function updateDebugLaunch(
  metadata: ProjectMetadata,
  values: DebugLaunchValues,
  ctx: MetadataUpdateContext
): Promise<MetadataChange> {
  const { user } = metadata;
  const result = ensureDebugLaunch(user.document, values);

  if (!result.changed && user.existed) {
    ctx.tracker.track(
      { kind: 'metadata', description: 'Debug launch settings', path: user.filePath },
      { status: 'skipped', reason: 'no-op' }
    );
    return { status: 'unchanged', filePath: user.filePath, changedFields: [] };
  }

  return persist(user, ctx, `Update debug launch settings (${values.configuration}|${values.platform})`, result.changedFields);
}
