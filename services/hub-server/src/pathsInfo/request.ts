import type { PathInfoCollector, PathInfoRecord } from './collector';

export type PathsInfoQuery = {
  paths: string[];
  expand: boolean;
};

const ROOT_ALIASES = new Set(['', '/', '.']);

/**
 * Reads a paths-info body leniently: anything that is not an object lists everything,
 * non-string paths are dropped and a non-boolean `expand` is ignored.
 */
export function parsePathsInfoBody(body: unknown): PathsInfoQuery {
  const query: PathsInfoQuery = { paths: [], expand: true };
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return query;
  }
  if ('paths' in body && Array.isArray(body.paths)) {
    query.paths = body.paths.filter((entry): entry is string => typeof entry === 'string');
  }
  if ('expand' in body && typeof body.expand === 'boolean') {
    query.expand = body.expand;
  }
  return query;
}

export function dedupePathInfo(records: PathInfoRecord[]): PathInfoRecord[] {
  const seen = new Set<string>();
  const unique: PathInfoRecord[] = [];
  for (const record of records) {
    const key = `${record.type}\u0000${record.path}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }
  return unique;
}

export async function collectPathsInfo(
  collector: PathInfoCollector,
  baseDir: string,
  query: PathsInfoQuery
): Promise<PathInfoRecord[]> {
  if (query.paths.length === 0) {
    return collector.collect(baseDir);
  }

  const results: PathInfoRecord[] = [];
  for (const requested of query.paths) {
    const trimmed = requested.trim();
    if (ROOT_ALIASES.has(trimmed)) {
      if (query.expand) {
        results.push(...(await collector.collect(baseDir)));
      } else {
        results.push({ path: '', type: 'directory' });
      }
      continue;
    }
    if (query.expand) {
      results.push(...(await collector.collect(baseDir, trimmed)));
      continue;
    }
    const record = await collector.describe(baseDir, trimmed);
    if (record) {
      results.push(record);
    }
  }
  return dedupePathInfo(results);
}
