import path from 'node:path';
import { z } from 'zod';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const DEFAULT_LFS_SUFFIXES = ['.bin', '.safetensors', '.gguf', '.pt', '.pth', '.ckpt', '.h5', '.onnx', '.msgpack'];

const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nonnegative(),
  logLevel: z.custom<LogLevel>((value) =>
    value === 'fatal' ||
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug' ||
    value === 'trace'
  ),
  hubRoot: z.string().min(1),
  metricsEnabled: z.boolean(),
  files: z.object({
    probeEtag: z.boolean(),
    lfsSuffixes: z.array(z.string().min(1))
  }),
  pathsInfo: z.object({
    computeDigests: z.boolean()
  }),
  hashCache: z.object({
    maxEntries: z.number().int().nonnegative()
  }),
  requestLogging: z.object({
    enabled: z.boolean(),
    bodyMaxBytes: z.number().int().nonnegative(),
    headersMode: z.enum(['all', 'minimal']),
    redact: z.boolean(),
    responseHeaders: z.boolean()
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

let cachedConfig: ServiceConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function parseSuffixList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
      return normalized;
    default:
      return 'info';
  }
}

function resolveHeadersMode(value: string | undefined): 'all' | 'minimal' {
  return value?.trim().toLowerCase() === 'minimal' ? 'minimal' : 'all';
}

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const host = env.HUBSTUB_HOST || env.HOST || '127.0.0.1';
  const port = parseNumber(env.HUBSTUB_PORT || env.PORT, 8000);
  const logLevel = resolveLogLevel(env.HUBSTUB_LOG_LEVEL);
  const hubRoot = path.resolve(env.HUBSTUB_ROOT?.trim() || 'fixtures');
  const metricsEnabled = parseBoolean(env.HUBSTUB_METRICS_ENABLED, true);
  const hashCacheMaxEntries = parseNumber(env.HUBSTUB_HASH_CACHE_MAX_ENTRIES, 0);
  const bodyMaxBytes = parseNumber(env.HUBSTUB_LOG_BODY_MAX, 4096);

  const candidateConfig: ServiceConfig = {
    host,
    port,
    logLevel,
    hubRoot,
    metricsEnabled,
    files: {
      probeEtag: parseBoolean(env.HUBSTUB_PROBE_ETAG, false),
      lfsSuffixes: parseSuffixList(env.HUBSTUB_LFS_SUFFIXES, DEFAULT_LFS_SUFFIXES)
    },
    pathsInfo: {
      computeDigests: parseBoolean(env.HUBSTUB_PATHS_INFO_DIGESTS, true)
    },
    hashCache: {
      maxEntries: hashCacheMaxEntries > 0 ? Math.floor(hashCacheMaxEntries) : 0
    },
    requestLogging: {
      enabled: parseBoolean(env.HUBSTUB_LOG_REQUESTS, true),
      bodyMaxBytes: bodyMaxBytes >= 0 ? Math.floor(bodyMaxBytes) : 4096,
      headersMode: resolveHeadersMode(env.HUBSTUB_LOG_HEADERS),
      redact: parseBoolean(env.HUBSTUB_LOG_REDACT, true),
      responseHeaders: parseBoolean(env.HUBSTUB_LOG_RESPONSE_HEADERS, true)
    }
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
