import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import {
  PATHS_INFO_SIDECAR_FILENAME,
  parsePathsInfoSidecar,
  type PathsInfoSidecarEntry
} from '@hubstub/shared';
import { hasErrorCode, isMissingFileError } from '../errors';

export type SidecarIndex = Map<string, PathsInfoSidecarEntry>;

export type TrustedSidecarEntry = PathsInfoSidecarEntry & {
  size: number;
  oid: string;
  lfs: { oid: string };
};

/**
 * A precomputed entry is reused only when its recorded size matches the file on disk and
 * both digests are present.
 */
export function isTrustedSidecarEntry(entry: PathsInfoSidecarEntry, actualSize: number): entry is TrustedSidecarEntry {
  const sizesAgree = typeof entry.size === 'number' && entry.size === actualSize;
  if (!sizesAgree) {
    return false;
  }
  return typeof entry.oid === 'string' && entry.lfs !== undefined && typeof entry.lfs.oid === 'string';
}

export async function loadSidecarIndex(baseDir: string, logger?: FastifyBaseLogger): Promise<SidecarIndex> {
  const sidecarPath = path.join(baseDir, PATHS_INFO_SIDECAR_FILENAME);
  let raw: string;
  try {
    raw = await fs.readFile(sidecarPath, 'utf8');
  } catch (err) {
    if (isMissingFileError(err) || hasErrorCode(err, 'EISDIR')) {
      return new Map();
    }
    logger?.debug({ err, sidecarPath }, 'ignoring unreadable paths-info sidecar');
    return new Map();
  }
  try {
    return parsePathsInfoSidecar(JSON.parse(raw));
  } catch (err) {
    logger?.debug({ err, sidecarPath }, 'ignoring invalid paths-info sidecar');
    return new Map();
  }
}
