import { promises as fs } from 'node:fs';
import path from 'node:path';
import { repoRootFor, type RepoKind } from '@hubstub/shared';
import { SkeletonError, hasErrorCode } from './errors';
import type { RemoteTreeFile } from './treeClient';

export const DEFAULT_FILL_SIZE_BYTES = 16 * 1024 * 1024;
export const FILL_CHUNK_BYTES = 1024 * 1024;

export type FilterOptions = {
  include?: string[];
  exclude?: string[];
  /** Negative or absent keeps every file. */
  maxFiles?: number;
};

export type FillOptions = {
  sizeBytes: number;
  pattern: Buffer;
};

export type GenerateSkeletonOptions = {
  root: string;
  files: Array<Pick<RemoteTreeFile, 'path'>>;
  force?: boolean;
  dryRun?: boolean;
  fill?: FillOptions | null;
};

export type GeneratedSkeleton = {
  root: string;
  /** Absolute paths, in input order. Planned paths when dry-running. */
  created: string[];
};

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  b: 1,
  kb: 1000,
  mb: 1000 ** 2,
  gb: 1000 ** 3,
  kib: 1024,
  ki: 1024,
  mib: 1024 ** 2,
  mi: 1024 ** 2,
  gib: 1024 ** 3,
  gi: 1024 ** 3
};

const globRegexCache = new Map<string, RegExp>();

function translateGlob(pattern: string): string {
  let regex = '';
  for (let index = 0; index < pattern.length; index += 1) {
    const char = pattern[index];
    if (char === '*') {
      regex += '.*';
    } else if (char === '?') {
      regex += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', index + 2);
      if (close === -1) {
        regex += '\\[';
        continue;
      }
      let body = pattern.slice(index + 1, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith('^')) {
        body = `\\${body}`;
      }
      regex += `[${body}]`;
      index = close;
    } else {
      regex += char.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return regex;
}

/**
 * Shell-style matching over the whole path: `*` and `?` also match `/`, `[seq]` and
 * `[!seq]` match one character in or out of the set.
 */
export function matchesGlob(filePath: string, pattern: string): boolean {
  let regex = globRegexCache.get(pattern);
  if (!regex) {
    regex = new RegExp(`^${translateGlob(pattern)}$`, 's');
    globRegexCache.set(pattern, regex);
  }
  return regex.test(filePath);
}

export function applyFilters<T extends { path: string }>(files: T[], options: FilterOptions): T[] {
  const include = options.include ?? [];
  const exclude = options.exclude ?? [];
  const kept = files.filter((file) => {
    if (include.length > 0 && !include.some((pattern) => matchesGlob(file.path, pattern))) {
      return false;
    }
    return !exclude.some((pattern) => matchesGlob(file.path, pattern));
  });
  if (options.maxFiles !== undefined && options.maxFiles >= 0) {
    return kept.slice(0, options.maxFiles);
  }
  return kept;
}

export function destinationRoot(hubRoot: string, repoType: RepoKind, repoId: string): string {
  return repoRootFor(hubRoot, repoType, repoId);
}

export function safeJoin(root: string, relativePath: string): string {
  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, relativePath);
  if (target !== resolvedRoot && !target.startsWith(resolvedRoot + path.sep)) {
    throw new SkeletonError(`Suspicious path outside root: ${relativePath}`);
  }
  return target;
}

/**
 * Parses sizes such as `1024`, `64kb`, `16MB` or `16MiB` into bytes. Decimal units are powers
 * of 1000 and binary units powers of 1024; anything after a `.` or `,` is dropped.
 */
export function parseSize(value: string): number {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new SkeletonError('Empty size string');
  }
  let digits = '';
  let unit = '';
  for (const char of trimmed) {
    if (char >= '0' && char <= '9') {
      digits += char;
    } else if (char === '.' || char === ',') {
      break;
    } else {
      unit += char;
    }
  }
  if (!digits) {
    throw new SkeletonError(`Invalid size: ${value}`);
  }
  const multiplier = SIZE_UNITS[unit.trim().toLowerCase()];
  if (multiplier === undefined) {
    throw new SkeletonError(`Unknown size unit in: ${value}`);
  }
  return Number.parseInt(digits, 10) * multiplier;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return false;
    }
    throw err;
  }
}

export async function touchEmptyFile(target: string, force = false): Promise<void> {
  if (!force && (await pathExists(target))) {
    return;
  }
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, Buffer.alloc(0));
}

/**
 * Writes `sizeBytes` bytes made of `pattern` repeated end to end, at most
 * {@link FILL_CHUNK_BYTES} per write. An empty pattern fills with zero bytes.
 */
export async function writeFilledFile(target: string, fill: FillOptions, force = false): Promise<void> {
  if (fill.sizeBytes < 0) {
    throw new SkeletonError('Fill size must not be negative');
  }
  if (!force && (await pathExists(target))) {
    return;
  }
  await fs.mkdir(path.dirname(target), { recursive: true });

  const pattern = fill.pattern.length > 0 ? fill.pattern : Buffer.alloc(1);
  const chunkBytes =
    pattern.length >= FILL_CHUNK_BYTES
      ? FILL_CHUNK_BYTES
      : Math.floor(FILL_CHUNK_BYTES / pattern.length) * pattern.length;
  const chunk = Buffer.alloc(chunkBytes, pattern);

  const handle = await fs.open(target, 'w');
  try {
    let written = 0;
    while (written + chunk.length <= fill.sizeBytes) {
      await handle.write(chunk);
      written += chunk.length;
    }
    const remaining = fill.sizeBytes - written;
    if (remaining > 0) {
      await handle.write(Buffer.alloc(remaining, pattern));
    }
  } finally {
    await handle.close();
  }
}

export async function generateSkeleton(options: GenerateSkeletonOptions): Promise<GeneratedSkeleton> {
  const root = path.resolve(options.root);
  const created: string[] = [];
  if (!options.dryRun) {
    await fs.mkdir(root, { recursive: true });
  }
  for (const file of options.files) {
    const target = safeJoin(root, file.path);
    if (!options.dryRun) {
      if (options.fill) {
        await writeFilledFile(target, options.fill, options.force);
      } else {
        await touchEmptyFile(target, options.force);
      }
    }
    created.push(target);
  }
  return { root, created };
}
