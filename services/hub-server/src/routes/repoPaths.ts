import { DATASETS_DIRNAME } from '@hubstub/shared';
import type { RepoRef } from '../repos/repoRoot';

export type ResolveTarget = {
  repo: RepoRef;
  revision: string;
  filename: string;
};

export type RepoInfoTarget = { action: 'info'; repoId: string; revision?: string };

export type RepoTreeTarget = { action: 'tree'; repoId: string; revision: string; path: string };

export type RepoApiTarget = RepoInfoTarget | RepoTreeTarget;

export type PathsInfoTarget = {
  repoId: string;
  revision: string;
};

const RESOLVE_PATTERN = /^(.+?)\/resolve\/([^/]+)\/(.+)$/;
const REVISION_PATTERN = /^(.+)\/revision\/([^/]+)\/?$/;
const PATHS_INFO_PATTERN = /^(.+)\/paths-info\/([^/]+)\/?$/;

function trimSlashes(value: string): string {
  return value.replace(/^\/+/, '').replace(/\/+$/, '');
}

/** Parses `{repoId}/resolve/{revision}/{filename}`; a `datasets/` prefix selects a dataset. */
export function parseResolvePath(wildcard: string): ResolveTarget | null {
  const match = RESOLVE_PATTERN.exec(trimSlashes(wildcard));
  if (!match) {
    return null;
  }
  const [, repoPath, revision, filename] = match;
  const datasetPrefix = `${DATASETS_DIRNAME}/`;
  const repo: RepoRef = repoPath.startsWith(datasetPrefix)
    ? { kind: 'dataset', repoId: repoPath.slice(datasetPrefix.length) }
    : { kind: 'model', repoId: repoPath };
  if (!repo.repoId) {
    return null;
  }
  return { repo, revision, filename };
}

/**
 * Lists every reading of a `GET /api/{kind}s/*` wildcard. Repository ids may themselves
 * contain a `tree` segment, so the info lookup of the whole path comes first, followed by
 * each `{repoId}/tree/{revision}[/{path}]` split, longest id first.
 */
export function parseRepoApiPath(wildcard: string): RepoApiTarget[] {
  const trimmed = trimSlashes(wildcard);
  if (!trimmed) {
    return [];
  }
  const revisionMatch = REVISION_PATTERN.exec(trimmed);
  if (revisionMatch) {
    return [{ action: 'info', repoId: revisionMatch[1], revision: revisionMatch[2] }];
  }
  const segments = trimmed.split('/');
  const targets: RepoApiTarget[] = [{ action: 'info', repoId: trimmed }];
  for (let index = segments.length - 2; index >= 1; index -= 1) {
    if (segments[index] !== 'tree' || !segments[index + 1]) {
      continue;
    }
    targets.push({
      action: 'tree',
      repoId: segments.slice(0, index).join('/'),
      revision: segments[index + 1],
      path: segments.slice(index + 2).join('/')
    });
  }
  return targets;
}

/**
 * Picks the first reading whose repository exists. When none does, the leading info
 * lookup is returned so the caller reports the whole path as a missing repository.
 */
export async function selectRepoApiTarget(
  targets: RepoApiTarget[],
  repoExists: (repoId: string) => Promise<boolean>
): Promise<RepoApiTarget | null> {
  for (const target of targets) {
    if (await repoExists(target.repoId)) {
      return target;
    }
  }
  return targets[0] ?? null;
}

export function parsePathsInfoPath(wildcard: string): PathsInfoTarget | null {
  const match = PATHS_INFO_PATTERN.exec(trimSlashes(wildcard));
  if (!match) {
    return null;
  }
  return { repoId: match[1], revision: match[2] };
}
