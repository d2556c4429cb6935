import type { Stats } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { isMissingFileError } from '../errors';

export type BoundedPath = {
  absolutePath: string;
  /** Posix path relative to the root, `''` for the root itself. */
  relativePath: string;
};

export type PathResolution =
  | ({ status: 'found'; stats: Stats } & BoundedPath)
  | ({ status: 'not_found' } & BoundedPath)
  | { status: 'out_of_bounds' };

/**
 * Turns a request-supplied path into a normalized posix path without leading slashes.
 * `..` segments are collapsed, so the result may still start with `..`.
 */
export function normalizeRelativePath(input: string): string {
  const normalized = path.posix.normalize(input.replace(/\\/g, '/').replace(/^\/+/, ''));
  if (normalized === '.' || normalized === './') {
    return '';
  }
  return normalized.replace(/\/+$/, '').replace(/^\.\//, '');
}

export function isWithinRoot(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}

/**
 * Joins `relativePath` onto `root` and returns null when the result lands outside `root`.
 * Purely textual; the filesystem is not consulted.
 */
export function boundPath(root: string, relativePath: string): BoundedPath | null {
  if (relativePath.includes('\0')) {
    return null;
  }
  const resolvedRoot = path.resolve(root);
  const normalized = normalizeRelativePath(relativePath);
  const absolutePath = path.resolve(resolvedRoot, normalized);
  if (!isWithinRoot(resolvedRoot, absolutePath)) {
    return null;
  }
  const relative = path.relative(resolvedRoot, absolutePath);
  return {
    absolutePath,
    relativePath: relative.split(path.sep).join('/')
  };
}

export async function statOptional(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (isMissingFileError(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * Follows symlinks on both sides and reports whether `target` still lies under `root`.
 * A target that no longer exists is not within the root.
 */
export async function linksWithinRoot(root: string, target: string): Promise<boolean> {
  try {
    const [realRoot, realTarget] = await Promise.all([fs.realpath(root), fs.realpath(target)]);
    return isWithinRoot(realRoot, realTarget);
  } catch (err) {
    if (isMissingFileError(err)) {
      return false;
    }
    throw err;
  }
}

/**
 * Resolves `relativePath` under `root`, checking the filesystem on every call. A path
 * that exists but links outside the root is out of bounds.
 */
export async function resolvePath(root: string, relativePath: string): Promise<PathResolution> {
  const bounded = boundPath(root, relativePath);
  if (!bounded) {
    return { status: 'out_of_bounds' };
  }
  const stats = await statOptional(bounded.absolutePath);
  if (!stats) {
    return { status: 'not_found', ...bounded };
  }
  if (!(await linksWithinRoot(root, bounded.absolutePath))) {
    return { status: 'out_of_bounds' };
  }
  return { status: 'found', stats, ...bounded };
}
