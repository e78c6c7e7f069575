/**
 * @module @envstage/core/resolvers/match-predicates
 *
 * Ordered predicates for resolving one target from a loose name. Each
 * predicate narrows the full candidate set; the first one that leaves
 * exactly one candidate wins.
 */

import { minimatch } from 'minimatch';
import type { ProjectMatchPredicateConfig } from '../settings.js';
import { comparePaths, containsIgnoreCase, equalsIgnoreCase, pathDepth, stem } from './file-search.js';

export interface MatchPredicate<T> {
  readonly name: string;
  /** Picks a best guess rather than an exact rule. */
  readonly heuristic?: boolean;
  select(candidates: readonly T[]): T[];
}

export interface MatchOutcome<T> {
  winner?: T;
  predicate?: string;
  heuristic: boolean;
}

export function pickUnique<T>(
  candidates: readonly T[],
  predicates: readonly MatchPredicate<T>[]
): MatchOutcome<T> {
  if (candidates.length === 1) {
    return { winner: candidates[0], predicate: 'single', heuristic: false };
  }

  for (const predicate of predicates) {
    const selected = predicate.select(candidates);
    if (selected.length === 1) {
      return { winner: selected[0], predicate: predicate.name, heuristic: predicate.heuristic ?? false };
    }
  }

  return { heuristic: false };
}

/**
 * Candidate whose key equals `name`, ignoring case.
 */
export function exactName<T>(name: string, key: (candidate: T) => string): MatchPredicate<T> {
  return {
    name: 'exact',
    select: (candidates) => candidates.filter((candidate) => equalsIgnoreCase(key(candidate), name)),
  };
}

/**
 * First candidate, in the given order, whose key contains `name`.
 */
export function firstContaining<T>(name: string, key: (candidate: T) => string): MatchPredicate<T> {
  return {
    name: 'contains',
    select: (candidates) => {
      const found = candidates.find((candidate) => containsIgnoreCase(key(candidate), name));
      return found === undefined ? [] : [found];
    },
  };
}

/**
 * Path with the fewest separators; ties go to the ordinally smallest path,
 * so this always yields one candidate when given any.
 */
export function shallowestPath(): MatchPredicate<string> {
  return {
    name: 'shallowest',
    heuristic: true,
    select: (candidates) => {
      const sorted = [...candidates].sort((a, b) => pathDepth(a) - pathDepth(b) || comparePaths(a, b));
      return sorted.slice(0, 1);
    },
  };
}

export function globName(glob: string, key: (candidate: string) => string): MatchPredicate<string> {
  return {
    name: `glob:${glob}`,
    select: (candidates) => candidates.filter((candidate) => minimatch(key(candidate), glob, { nocase: true })),
  };
}

/**
 * Build project-file predicates from settings. Keys are file stems, so
 * `Kernel.Service.csproj` matches pattern `Kernel.Service` exactly.
 */
export function createProjectPredicates(
  order: readonly ProjectMatchPredicateConfig[],
  pattern: string,
  namespacePrefix: string
): MatchPredicate<string>[] {
  const predicates: MatchPredicate<string>[] = [];

  for (const config of order) {
    switch (config.kind) {
      case 'exact':
        predicates.push(exactName(pattern, stem));
        break;
      case 'prefixed':
        if (namespacePrefix.length > 0) {
          predicates.push({ ...exactName(`${namespacePrefix}${pattern}`, stem), name: 'prefixed' });
        }
        break;
      case 'glob':
        predicates.push(globName(config.pattern.split('{pattern}').join(pattern), stem));
        break;
      case 'shallowest':
        predicates.push(shallowestPath());
        break;
    }
  }

  return predicates;
}
