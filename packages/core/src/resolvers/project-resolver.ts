/**
 * @module @envstage/core/resolvers/project-resolver
 * Find one project definition file under a workspace root from a loose name.
 */

import * as path from 'node:path';
import { NotFoundError, ProjectAmbiguousError } from '../errors.js';
import type { FSLike } from '../io/fs.js';
import { isDirectory } from '../io/fs.js';
import type { Logger } from '../logging.js';
import type { DeploySettings } from '../settings.js';
import type { ProjectDescriptor } from '../types.js';
import { containsIgnoreCase, findFiles, stem } from './file-search.js';
import { createProjectPredicates, pickUnique } from './match-predicates.js';

export type ProjectResolverSettings = Pick<
  DeploySettings,
  'projectExtension' | 'projectMatchOrder' | 'namespacePrefix'
>;

/**
 * @throws NotFoundError('workspace-root') when the root is not a directory
 */
export async function assertWorkspaceRoot(fsLike: FSLike, workspaceRoot: string): Promise<void> {
  if (!(await isDirectory(fsLike, workspaceRoot))) {
    throw new NotFoundError('workspace-root', workspaceRoot, path.dirname(workspaceRoot));
  }
}

export async function findProjectCandidates(
  workspaceRoot: string,
  pattern: string,
  settings: Pick<DeploySettings, 'projectExtension'>
): Promise<string[]> {
  return findFiles(workspaceRoot, {
    pattern: `**/*${settings.projectExtension}`,
    filter: (basename) =>
      basename.toLowerCase().endsWith(settings.projectExtension.toLowerCase()) &&
      containsIgnoreCase(stem(basename), pattern),
  });
}

export async function resolveProject(
  workspaceRoot: string,
  pattern: string,
  settings: ProjectResolverSettings,
  logger: Logger
): Promise<ProjectDescriptor> {
  const candidates = await findProjectCandidates(workspaceRoot, pattern, settings);
  if (candidates.length === 0) {
    throw new NotFoundError('project', pattern, workspaceRoot);
  }

  const predicates = createProjectPredicates(settings.projectMatchOrder, pattern, settings.namespacePrefix);
  const outcome = pickUnique(candidates, predicates);
  if (outcome.winner === undefined || outcome.predicate === undefined) {
    throw new ProjectAmbiguousError(pattern, candidates);
  }

  if (outcome.heuristic) {
    logger.warn('Several projects matched; picked one heuristically', {
      pattern,
      chosen: outcome.winner,
      predicate: outcome.predicate,
      candidates,
    });
  } else {
    logger.debug('Resolved project', { pattern, filePath: outcome.winner, predicate: outcome.predicate });
  }

  return {
    name: stem(outcome.winner),
    pattern,
    filePath: outcome.winner,
    directory: path.dirname(outcome.winner),
    matchedBy: outcome.predicate,
    candidates,
  };
}
