import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { repoKindPlural, type RepoKind } from '@hubstub/shared';
import { HubTreeClientError } from './errors';

export type RemoteTreeFile = {
  path: string;
  size: number | null;
  /** Git blob SHA-1 as reported by the remote. */
  oid: string | null;
  lfsOid: string | null;
  lfsSize: number | null;
};

export type HubTreeClientOptions = {
  endpoint: string;
  token?: string;
  userAgent?: string;
  fetchTimeoutMs?: number;
};

export type ListRepoFilesInput = {
  repoType: RepoKind;
  repoId: string;
  revision: string;
  signal?: AbortSignal;
};

export interface TreeClient {
  listRepoFiles(input: ListRepoFilesInput): Promise<RemoteTreeFile[]>;
}

const TREE_LIST_KEYS = ['tree', 'items', 'paths'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function combineSignals(primary: AbortController, external?: AbortSignal): void {
  if (!external) {
    return;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return;
  }
  external.addEventListener(
    'abort',
    () => {
      primary.abort(external.reason);
    },
    { once: true }
  );
}

/** Quotes each segment of a repository id while keeping its `/` separators. */
export function quoteRepoId(repoId: string): string {
  return repoId
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/**
 * Reads the file entries out of a tree listing. The listing may be a bare array or an object
 * holding one under `tree`, `items` or `paths`; entries of any other type are skipped.
 */
export function extractTreeFiles(payload: unknown): RemoteTreeFile[] {
  let items: unknown = payload;
  if (isRecord(payload)) {
    const key = TREE_LIST_KEYS.find((candidate) => Array.isArray(payload[candidate]));
    items = key ? payload[key] : undefined;
  }
  if (!Array.isArray(items)) {
    return [];
  }

  const files: RemoteTreeFile[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    const path = optionalString(item.path) ?? optionalString(item.rfilename);
    const type = optionalString(item.type) ?? optionalString(item.kind);
    if (!path || !type) {
      continue;
    }
    const normalizedType = type.toLowerCase();
    if (normalizedType !== 'file' && normalizedType !== 'blob') {
      continue;
    }
    const lfs = isRecord(item.lfs) ? item.lfs : null;
    files.push({
      path,
      size: optionalNumber(item.size),
      oid: optionalString(item.oid) ?? optionalString(item.sha),
      lfsOid: lfs ? optionalString(lfs.oid) : null,
      lfsSize: lfs ? optionalNumber(lfs.size) : null
    });
  }
  return files;
}

export class HubTreeClient implements TreeClient {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: HubTreeClientOptions) {
    if (!options.endpoint) {
      throw new Error('HubTreeClient requires an endpoint');
    }
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.token = options.token?.trim() || undefined;
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  buildTreeUrl(input: Pick<ListRepoFilesInput, 'repoType' | 'repoId' | 'revision'>): URL {
    const url = new URL(
      `${this.endpoint}/api/${repoKindPlural(input.repoType)}/${quoteRepoId(input.repoId)}/tree/${encodeURIComponent(
        input.revision
      )}`
    );
    url.searchParams.set('recursive', '1');
    url.searchParams.set('expand', '1');
    return url;
  }

  async listRepoFiles(input: ListRepoFilesInput): Promise<RemoteTreeFile[]> {
    const controller = new AbortController();
    combineSignals(controller, input.signal);
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await this.fetchRaw(this.buildTreeUrl(input), {
        method: 'GET',
        signal: controller.signal
      });
      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      return extractTreeFiles(await response.json());
    } catch (err) {
      // The abort reason, not an AbortError, is what fetch rejects with.
      if (controller.signal.aborted && !(err instanceof HubTreeClientError)) {
        throw new HubTreeClientError('Request aborted', {
          statusCode: 0,
          code: 'ABORTED',
          details: err instanceof Error ? err.message : String(err)
        });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private async fetchRaw(input: URL, init: RequestInit): Promise<Response> {
    const headers = new Headers({ Accept: 'application/json' });
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }
    return fetch(input, { ...init, headers });
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => null);
    let payload: unknown = text;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    const message = isRecord(payload) ? optionalString(payload.error) ?? optionalString(payload.detail) : null;
    throw new HubTreeClientError(message ?? (response.statusText || 'Tree request failed'), {
      statusCode: response.status,
      code: null,
      details: payload
    });
  }
}
