import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const DIGEST_CHUNK_BYTES = 1024 * 1024;

export type FileDigests = {
  /** SHA-1 of the content, hex. */
  sha1: string;
  /** SHA-256 of the content, hex, without an algorithm prefix. */
  sha256: string;
};

/**
 * Hashes a file with SHA-1 and SHA-256 in one pass, reading it in 1 MiB chunks.
 */
export async function hashFileDigests(filePath: string): Promise<FileDigests> {
  const sha1 = createHash('sha1');
  const sha256 = createHash('sha256');
  const stream = createReadStream(filePath, { highWaterMark: DIGEST_CHUNK_BYTES });
  for await (const chunk of stream) {
    sha1.update(chunk);
    sha256.update(chunk);
  }
  return {
    sha1: sha1.digest('hex'),
    sha256: sha256.digest('hex')
  };
}

export function formatLfsOid(sha256: string): string {
  return `sha256:${sha256}`;
}
