import type { Dirent } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { PATHS_INFO_SIDECAR_FILENAME, formatLfsOid } from '@hubstub/shared';
import type { HashCache } from '../hashing/hashCache';
import { linksWithinRoot, resolvePath, statOptional } from '../utils/path';
import { isTrustedSidecarEntry, loadSidecarIndex, type SidecarIndex } from './sidecar';

export type DirectoryRecord = {
  path: string;
  type: 'directory';
};

export type FileRecord = {
  path: string;
  type: 'file';
  size: number;
  oid?: string;
  lfs?: {
    oid: string;
    size: number;
  };
};

export type PathInfoRecord = DirectoryRecord | FileRecord;

export type CollectOptions = {
  /** Walk the whole subtree (default) or only direct children. */
  recursive?: boolean;
  /** Report the directory named by the prefix itself. Defaults to true. */
  includeSelf?: boolean;
};

export type PathInfoCollectorOptions = {
  hashCache: HashCache;
  computeDigests: boolean;
  logger?: FastifyBaseLogger;
};

export interface PathInfoCollector {
  collect(baseDir: string, relativePrefix?: string, options?: CollectOptions): Promise<PathInfoRecord[]>;
  describe(baseDir: string, relativePath: string): Promise<PathInfoRecord | null>;
  listFiles(baseDir: string): Promise<FileListing[]>;
}

export type FileListing = {
  path: string;
  size: number;
};

type WalkVisitor = {
  directory(relativePath: string): void;
  file(absolutePath: string, relativePath: string): Promise<void>;
};

function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

export function comparePaths(a: { path: string }, b: { path: string }): number {
  if (a.path === b.path) {
    return 0;
  }
  return a.path < b.path ? -1 : 1;
}

async function entryKind(rootDir: string, absolutePath: string, entry: Dirent): Promise<'file' | 'directory' | null> {
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isFile()) {
    return 'file';
  }
  if (entry.isSymbolicLink()) {
    // Linked files inside the root are listed; linked directories are not followed.
    const stats = await statOptional(absolutePath);
    if (!stats?.isFile()) {
      return null;
    }
    return (await linksWithinRoot(rootDir, absolutePath)) ? 'file' : null;
  }
  return null;
}

async function walk(
  rootDir: string,
  absoluteDir: string,
  relativeDir: string,
  depthRemaining: number | null,
  visitor: WalkVisitor
): Promise<void> {
  const entries = await fs.readdir(absoluteDir, { withFileTypes: true });
  for (const entry of entries) {
    const absolutePath = path.join(absoluteDir, entry.name);
    const relativePath = joinRelative(relativeDir, entry.name);
    const kind = await entryKind(rootDir, absolutePath, entry);
    if (kind === 'file') {
      if (relativePath === PATHS_INFO_SIDECAR_FILENAME) {
        continue;
      }
      await visitor.file(absolutePath, relativePath);
    } else if (kind === 'directory') {
      visitor.directory(relativePath);
      if (depthRemaining === null || depthRemaining > 1) {
        await walk(rootDir, absolutePath, relativePath, depthRemaining === null ? null : depthRemaining - 1, visitor);
      }
    }
  }
}

export function createPathInfoCollector(options: PathInfoCollectorOptions): PathInfoCollector {
  async function describeFile(
    absolutePath: string,
    relativePath: string,
    sizeBytes: number,
    sidecar: SidecarIndex
  ): Promise<FileRecord> {
    const entry = sidecar.get(relativePath);
    if (entry && isTrustedSidecarEntry(entry, sizeBytes)) {
      return {
        path: relativePath,
        type: 'file',
        size: sizeBytes,
        oid: entry.oid,
        lfs: { oid: entry.lfs.oid, size: sizeBytes }
      };
    }
    if (!options.computeDigests) {
      return { path: relativePath, type: 'file', size: sizeBytes };
    }
    const digests = await options.hashCache.digest(absolutePath);
    return {
      path: relativePath,
      type: 'file',
      size: sizeBytes,
      oid: digests.sha1,
      lfs: { oid: formatLfsOid(digests.sha256), size: sizeBytes }
    };
  }

  async function fileRecordAt(absolutePath: string, relativePath: string, sidecar: SidecarIndex): Promise<FileRecord | null> {
    const stats = await statOptional(absolutePath);
    if (!stats || !stats.isFile()) {
      return null;
    }
    return describeFile(absolutePath, relativePath, stats.size, sidecar);
  }

  async function walkRecords(
    baseDir: string,
    absoluteDir: string,
    relativeDir: string,
    recursive: boolean
  ): Promise<PathInfoRecord[]> {
    const sidecar = await loadSidecarIndex(baseDir, options.logger);
    const records: PathInfoRecord[] = [];
    await walk(baseDir, absoluteDir, relativeDir, recursive ? null : 1, {
      directory(relativePath) {
        records.push({ path: relativePath, type: 'directory' });
      },
      async file(absolutePath, relativePath) {
        const record = await fileRecordAt(absolutePath, relativePath, sidecar);
        if (record) {
          records.push(record);
        }
      }
    });
    return records;
  }

  return {
    async collect(baseDir, relativePrefix, collectOptions = {}) {
      const recursive = collectOptions.recursive ?? true;
      const includeSelf = collectOptions.includeSelf ?? true;
      const resolution = await resolvePath(baseDir, relativePrefix ?? '');
      if (resolution.status !== 'found') {
        return [];
      }
      if (resolution.relativePath === PATHS_INFO_SIDECAR_FILENAME) {
        return [];
      }

      if (resolution.stats.isFile()) {
        const sidecar = await loadSidecarIndex(path.resolve(baseDir), options.logger);
        const record = await describeFile(
          resolution.absolutePath,
          resolution.relativePath,
          resolution.stats.size,
          sidecar
        );
        return [record];
      }
      if (!resolution.stats.isDirectory()) {
        return [];
      }

      const records = await walkRecords(
        path.resolve(baseDir),
        resolution.absolutePath,
        resolution.relativePath,
        recursive
      );
      if (includeSelf && resolution.relativePath !== '') {
        records.push({ path: resolution.relativePath, type: 'directory' });
      }
      return records.sort(comparePaths);
    },

    async describe(baseDir, relativePath) {
      const resolution = await resolvePath(baseDir, relativePath);
      if (resolution.status !== 'found' || resolution.relativePath === PATHS_INFO_SIDECAR_FILENAME) {
        return null;
      }
      if (resolution.stats.isDirectory()) {
        return { path: resolution.relativePath, type: 'directory' };
      }
      if (!resolution.stats.isFile()) {
        return null;
      }
      const sidecar = await loadSidecarIndex(path.resolve(baseDir), options.logger);
      return describeFile(resolution.absolutePath, resolution.relativePath, resolution.stats.size, sidecar);
    },

    async listFiles(baseDir) {
      const root = path.resolve(baseDir);
      const files: FileListing[] = [];
      await walk(root, root, '', null, {
        directory() {},
        async file(absolutePath, relativePath) {
          const stats = await statOptional(absolutePath);
          if (stats?.isFile()) {
            files.push({ path: relativePath, size: stats.size });
          }
        }
      });
      return files.sort(comparePaths);
    }
  };
}
