import { promises as fs } from 'node:fs';
import path from 'node:path';
import { hashFileDigests, type FileDigests } from '@hubstub/shared';
import { HubError } from '../errors';

export type HashCacheLookupResult = 'hit' | 'miss';

export interface HashCacheOptions {
  /** 0 keeps every entry for the life of the process. */
  maxEntries?: number;
  compute?: (filePath: string) => Promise<FileDigests>;
  onLookup?: (result: HashCacheLookupResult) => void;
}

export interface HashCache {
  digest(filePath: string): Promise<FileDigests>;
  readonly size: number;
  clear(): void;
}

type FileSignature = {
  absolutePath: string;
  sizeBytes: number;
  modifiedAtMs: number;
};

function buildKey(signature: FileSignature): string {
  return `${signature.absolutePath}\u0000${signature.sizeBytes}\u0000${signature.modifiedAtMs}`;
}

async function readSignature(filePath: string): Promise<FileSignature> {
  const absolutePath = path.resolve(filePath);
  try {
    const stats = await fs.stat(absolutePath);
    return { absolutePath, sizeBytes: stats.size, modifiedAtMs: stats.mtimeMs };
  } catch (err) {
    throw new HubError('Failed to stat file for hashing', 'IO_ERROR', { path: absolutePath, cause: err });
  }
}

async function computeOrFail(
  compute: (filePath: string) => Promise<FileDigests>,
  absolutePath: string
): Promise<FileDigests> {
  try {
    return await compute(absolutePath);
  } catch (err) {
    throw new HubError('Failed to read file for hashing', 'IO_ERROR', { path: absolutePath, cause: err });
  }
}

/**
 * Memoizes file digests by path, size and modification time. A file that changes gets a
 * new key; the stale entry is only dropped once `maxEntries` pushes it out.
 *
 * Map reads and writes happen synchronously between awaits, so they never interleave. The
 * file read is outside that window: two concurrent misses on the same file both hash it.
 */
export function createHashCache(options: HashCacheOptions = {}): HashCache {
  const entries = new Map<string, FileDigests>();
  const maxEntries = options.maxEntries ?? 0;
  const compute = options.compute ?? hashFileDigests;

  function evictIfNeeded(): void {
    while (maxEntries > 0 && entries.size > maxEntries) {
      const oldest = entries.keys().next();
      if (oldest.done) {
        return;
      }
      entries.delete(oldest.value);
    }
  }

  return {
    async digest(filePath) {
      const signature = await readSignature(filePath);
      const key = buildKey(signature);
      const cached = entries.get(key);
      if (cached) {
        options.onLookup?.('hit');
        return cached;
      }
      options.onLookup?.('miss');
      const digests = await computeOrFail(compute, signature.absolutePath);
      entries.set(key, digests);
      evictIfNeeded();
      return digests;
    },
    get size() {
      return entries.size;
    },
    clear() {
      entries.clear();
    }
  };
}

/** A cache that never stores anything; every lookup hashes the file. */
export function createNoopHashCache(options: Pick<HashCacheOptions, 'compute' | 'onLookup'> = {}): HashCache {
  const compute = options.compute ?? hashFileDigests;
  return {
    async digest(filePath) {
      const absolutePath = path.resolve(filePath);
      options.onLookup?.('miss');
      return computeOrFail(compute, absolutePath);
    },
    get size() {
      return 0;
    },
    clear() {}
  };
}
