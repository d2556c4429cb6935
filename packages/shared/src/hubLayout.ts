import path from 'node:path';
import { z } from 'zod';

export const repoKindSchema = z.enum(['model', 'dataset']);
export type RepoKind = z.infer<typeof repoKindSchema>;

export const DATASETS_DIRNAME = 'datasets';

/**
 * Models live at `<hubRoot>/<repoId>`, datasets at `<hubRoot>/datasets/<repoId>`.
 * The result is not checked against the hub root; callers that take ids from requests must.
 */
export function repoRootFor(hubRoot: string, kind: RepoKind, repoId: string): string {
  const base = path.resolve(hubRoot);
  return kind === 'dataset' ? path.join(base, DATASETS_DIRNAME, repoId) : path.join(base, repoId);
}

export function repoKindPlural(kind: RepoKind): 'models' | 'datasets' {
  return kind === 'dataset' ? 'datasets' : 'models';
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}
