import type { Stats } from 'node:fs';
import type { Readable } from 'node:stream';
import { HubError, assertUnreachable, isMissingFileError } from '../errors';
import type { HashCache } from '../hashing/hashCache';
import {
  formatContentRange,
  formatUnsatisfiedRange,
  parseRangeHeader,
  rangeLength,
  type ByteRange
} from '../http/range';
import { resolveRepoRoot, type RepoRef } from '../repos/repoRoot';
import { resolvePath } from '../utils/path';
import { createByteWindowStream, openForReading, type OpenFile } from './byteWindowStream';

export const OCTET_STREAM = 'application/octet-stream';

export type FileRequestMethod = 'GET' | 'HEAD';

export type FileRequest = {
  repo: RepoRef;
  revision: string;
  filename: string;
  method: FileRequestMethod;
  rangeHeader?: string;
};

export type FileResponseKind = 'probe' | 'full' | 'partial' | 'unsatisfiable';

export type FileResponse = {
  kind: FileResponseKind;
  status: 200 | 206 | 416;
  headers: Record<string, string>;
  body: Readable | null;
  /** Bytes the body will carry once fully sent. */
  bodyLength: number;
};

export type FileServerOptions = {
  hubRoot: string;
  hashCache: HashCache;
  /** Lower-case suffixes, dot included, that mark large binary files. */
  lfsSuffixes: string[];
  /** Hash the file on every probe to report an `ETag`. Costs a full read per uncached file. */
  probeEtag: boolean;
  openFile?: OpenFile;
};

export interface FileServer {
  serve(request: FileRequest): Promise<FileResponse>;
}

type ResolvedFile = {
  absolutePath: string;
  stats: Stats;
};

function fileNotFound(request: FileRequest): HubError {
  return new HubError('File not found', 'ENTRY_NOT_FOUND', {
    repoId: request.repo.repoId,
    filename: request.filename
  });
}

export function buildContentDisposition(filename: string | null): string {
  if (!filename) {
    return 'attachment';
  }
  const sanitized = filename.replace(/"/g, "'");
  const encoded = encodeURIComponent(filename);
  return `attachment; filename="${sanitized}"; filename*=UTF-8''${encoded}`;
}

function basename(filename: string): string {
  const segments = filename.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? filename;
}

export function createFileServer(options: FileServerOptions): FileServer {
  const lfsSuffixes = options.lfsSuffixes.map((suffix) => suffix.toLowerCase());
  const openFile = options.openFile ?? openForReading;

  function isLfsFile(filename: string): boolean {
    const lowered = filename.toLowerCase();
    return lfsSuffixes.some((suffix) => lowered.endsWith(suffix));
  }

  async function resolveFile(request: FileRequest): Promise<ResolvedFile> {
    const repoRoot = await resolveRepoRoot(options.hubRoot, request.repo);
    const resolution = await resolvePath(repoRoot, request.filename);
    switch (resolution.status) {
      case 'out_of_bounds':
        throw new HubError('File not found', 'OUT_OF_BOUNDS', { repoId: request.repo.repoId });
      case 'not_found':
        throw fileNotFound(request);
      case 'found':
        if (!resolution.stats.isFile()) {
          throw fileNotFound(request);
        }
        return { absolutePath: resolution.absolutePath, stats: resolution.stats };
      default:
        return assertUnreachable(resolution);
    }
  }

  async function describeFile(request: FileRequest, file: ResolvedFile): Promise<Record<string, string>> {
    const size = file.stats.size;
    const lfs = isLfsFile(request.filename);
    const headers: Record<string, string> = {
      'content-length': String(size),
      'content-type': OCTET_STREAM,
      'accept-ranges': 'bytes',
      'x-repo-commit': request.revision,
      'x-revision': request.revision
    };
    if (lfs) {
      headers['x-lfs-size'] = String(size);
    }
    if (options.probeEtag) {
      const digests = await options.hashCache.digest(file.absolutePath);
      headers.etag = `"${lfs ? digests.sha256 : digests.sha1}"`;
    }
    return headers;
  }

  function contentHeaders(request: FileRequest, file: ResolvedFile, base: Record<string, string>) {
    return {
      ...base,
      'content-disposition': buildContentDisposition(basename(request.filename)),
      'last-modified': file.stats.mtime.toUTCString()
    };
  }

  // Opened before any header is handed back, so a file that vanished since resolution
  // fails the request instead of a committed response.
  async function openBody(file: ResolvedFile, start: number, length: number): Promise<Readable> {
    try {
      const handle = await openFile(file.absolutePath);
      return createByteWindowStream(handle, start, length);
    } catch (err) {
      throw new HubError('File could not be opened', 'IO_ERROR', {
        path: file.absolutePath,
        missing: isMissingFileError(err),
        cause: err instanceof Error ? err.message : String(err)
      });
    }
  }

  async function serveFull(request: FileRequest, file: ResolvedFile, base: Record<string, string>): Promise<FileResponse> {
    const size = file.stats.size;
    return {
      kind: 'full',
      status: 200,
      headers: contentHeaders(request, file, base),
      body: await openBody(file, 0, size),
      bodyLength: size
    };
  }

  async function servePartial(
    request: FileRequest,
    file: ResolvedFile,
    base: Record<string, string>,
    range: ByteRange
  ): Promise<FileResponse> {
    const length = rangeLength(range);
    return {
      kind: 'partial',
      status: 206,
      headers: {
        ...contentHeaders(request, file, base),
        'content-range': formatContentRange(range, file.stats.size),
        'content-length': String(length)
      },
      body: await openBody(file, range.start, length),
      bodyLength: length
    };
  }

  return {
    async serve(request) {
      const file = await resolveFile(request);
      const size = file.stats.size;

      if (request.method === 'HEAD') {
        return {
          kind: 'probe',
          status: 200,
          headers: await describeFile(request, file),
          body: null,
          bodyLength: 0
        };
      }

      const rangeHeader = request.rangeHeader?.trim();
      if (!rangeHeader) {
        return serveFull(request, file, await describeFile(request, file));
      }

      const parsed = parseRangeHeader(rangeHeader, size);
      switch (parsed.kind) {
        case 'malformed':
          return serveFull(request, file, await describeFile(request, file));
        case 'unsatisfiable':
          return {
            kind: 'unsatisfiable',
            status: 416,
            headers: {
              'content-range': formatUnsatisfiedRange(size),
              'accept-ranges': 'bytes'
            },
            body: null,
            bodyLength: 0
          };
        case 'satisfiable':
          return servePartial(request, file, await describeFile(request, file), parsed.range);
        default:
          return assertUnreachable(parsed);
      }
    }
  };
}
