import { z } from 'zod';

export const PATHS_INFO_SIDECAR_FILENAME = '.paths-info.json';
export const PATHS_INFO_SIDECAR_VERSION = 1;

const lfsPointerSchema = z
  .object({
    oid: z.string().optional(),
    size: z.number().int().nonnegative().optional()
  })
  .passthrough();

// Entries stay loose: readers decide per entry whether it can be trusted.
export const pathsInfoSidecarEntrySchema = z
  .object({
    path: z.string(),
    type: z.string(),
    size: z.number().optional(),
    oid: z.string().optional(),
    etag: z.string().optional(),
    lfs: lfsPointerSchema.optional()
  })
  .passthrough();
export type PathsInfoSidecarEntry = z.infer<typeof pathsInfoSidecarEntrySchema>;

export const pathsInfoSidecarSchema = z
  .object({
    version: z.number().int().optional(),
    entries: z.array(z.unknown())
  })
  .passthrough();

export type PathsInfoSidecarFile = {
  version: number;
  entries: Array<{
    path: string;
    type: 'file';
    size: number;
    oid: string;
    etag: string;
    lfs: { oid: string; size: number };
  }>;
};

/**
 * Parses a sidecar document and returns its file entries keyed by posix path.
 * Entries that are not objects, not files or lack a string path are skipped.
 */
export function parsePathsInfoSidecar(payload: unknown): Map<string, PathsInfoSidecarEntry> {
  const result = new Map<string, PathsInfoSidecarEntry>();
  const parsed = pathsInfoSidecarSchema.safeParse(payload);
  if (!parsed.success) {
    return result;
  }
  for (const raw of parsed.data.entries) {
    const entry = pathsInfoSidecarEntrySchema.safeParse(raw);
    if (!entry.success || entry.data.type !== 'file') {
      continue;
    }
    result.set(entry.data.path, entry.data);
  }
  return result;
}
