import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  PATHS_INFO_SIDECAR_FILENAME,
  PATHS_INFO_SIDECAR_VERSION,
  formatLfsOid,
  hashFileDigests,
  toPosixPath,
  type PathsInfoSidecarFile
} from '@hubstub/shared';
import { hasErrorCode } from './errors';

async function fileSize(target: string): Promise<number | null> {
  try {
    const stats = await fs.stat(target);
    return stats.isFile() ? stats.size : null;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return null;
    }
    throw err;
  }
}

export async function buildSidecar(root: string, filePaths: string[]): Promise<PathsInfoSidecarFile> {
  const entries: PathsInfoSidecarFile['entries'] = [];
  for (const filePath of filePaths) {
    const size = await fileSize(filePath);
    if (size === null) {
      continue;
    }
    const digests = await hashFileDigests(filePath);
    entries.push({
      path: toPosixPath(path.relative(root, filePath)),
      type: 'file',
      size,
      oid: digests.sha1,
      etag: digests.sha1,
      lfs: { oid: formatLfsOid(digests.sha256), size }
    });
  }
  return { version: PATHS_INFO_SIDECAR_VERSION, entries };
}

/**
 * Records size and digests of the files as they are on disk, so the served metadata matches
 * the content. Returns the sidecar path, or null when none of the files exist. A dry run
 * reports the path without writing.
 */
export async function writePathsInfoSidecar(root: string, filePaths: string[], dryRun = false): Promise<string | null> {
  const sidecar = await buildSidecar(root, filePaths);
  if (sidecar.entries.length === 0) {
    return null;
  }
  const sidecarPath = path.join(root, PATHS_INFO_SIDECAR_FILENAME);
  if (dryRun) {
    return sidecarPath;
  }
  await fs.mkdir(root, { recursive: true });
  await fs.writeFile(sidecarPath, `${JSON.stringify(sidecar, null, 2)}\n`, 'utf8');
  return sidecarPath;
}
