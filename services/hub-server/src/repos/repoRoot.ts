import path from 'node:path';
import { DATASETS_DIRNAME, type RepoKind } from '@hubstub/shared';
import { HubError } from '../errors';
import { boundPath, statOptional } from '../utils/path';

export type RepoRef = {
  kind: RepoKind;
  repoId: string;
};

const REPO_NOT_FOUND_MESSAGES: Record<RepoKind, string> = {
  model: 'Repository not found',
  dataset: 'Dataset not found'
};

export function repoNotFound(kind: RepoKind, repoId: string): HubError {
  return new HubError(REPO_NOT_FOUND_MESSAGES[kind], 'REPO_NOT_FOUND', { kind, repoId });
}

/**
 * Maps a repository to its directory under the hub root. Ids that escape their
 * namespace (the hub root for models, `datasets/` for datasets) count as missing.
 */
export function locateRepoRoot(hubRoot: string, repo: RepoRef): string | null {
  const base = repo.kind === 'dataset' ? path.join(path.resolve(hubRoot), DATASETS_DIRNAME) : path.resolve(hubRoot);
  const bounded = boundPath(base, repo.repoId);
  if (!bounded || bounded.relativePath === '') {
    return null;
  }
  return bounded.absolutePath;
}

/** The repository directory when it exists on disk, otherwise null. */
export async function findRepoRoot(hubRoot: string, repo: RepoRef): Promise<string | null> {
  const root = locateRepoRoot(hubRoot, repo);
  if (!root) {
    return null;
  }
  const stats = await statOptional(root);
  return stats?.isDirectory() ? root : null;
}

export async function resolveRepoRoot(hubRoot: string, repo: RepoRef): Promise<string> {
  const root = await findRepoRoot(hubRoot, repo);
  if (!root) {
    throw repoNotFound(repo.kind, repo.repoId);
  }
  return root;
}
