import fp from 'fastify-plugin';
import type { ServiceConfig } from '../config/serviceConfig';

declare module 'fastify' {
  interface FastifyRequest {
    requestLogStart?: bigint;
  }
}

type RequestLoggingOptions = ServiceConfig['requestLogging'];

type HeaderValue = string | number | string[] | undefined;

export const REDACTED_VALUE = '***';

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'proxy-authorization',
  'x-api-key',
  'x-hub-token'
]);

const MINIMAL_HEADERS = ['user-agent', 'content-type', 'range', 'content-length', 'accept', 'referer', 'origin'];

function stringifyHeader(value: HeaderValue): string {
  if (value === undefined) {
    return '-';
  }
  return Array.isArray(value) ? value.join(', ') : String(value);
}

export function snapshotHeaders(
  headers: Record<string, HeaderValue>,
  mode: RequestLoggingOptions['headersMode'],
  redact: boolean
): Record<string, string> {
  const snapshot: Record<string, string> = {};
  const keys = mode === 'all' ? Object.keys(headers) : MINIMAL_HEADERS;
  for (const key of keys) {
    const name = key.toLowerCase();
    const value = stringifyHeader(headers[key]);
    snapshot[name] = redact && SENSITIVE_HEADERS.has(name) && value !== '-' ? REDACTED_VALUE : value;
  }
  return snapshot;
}

export function truncateBody(body: unknown, maxBytes: number): string | null {
  if (body === undefined || body === null) {
    return null;
  }
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  if (!text) {
    return null;
  }
  const bytes = Buffer.from(text, 'utf8');
  return bytes.length <= maxBytes ? text : bytes.subarray(0, maxBytes).toString('utf8');
}

function splitUrl(url: string): { path: string; query: string | null } {
  const index = url.indexOf('?');
  if (index === -1) {
    return { path: url, query: null };
  }
  return { path: url.slice(0, index), query: url.slice(index + 1) || null };
}

export const requestLoggingPlugin = fp<RequestLoggingOptions>(async (app, options) => {
  if (!options.enabled) {
    return;
  }

  app.addHook('onRequest', async (request, reply) => {
    request.requestLogStart = process.hrtime.bigint();
    reply.header('x-request-id', request.id);
    const { path, query } = splitUrl(request.url);
    request.log.info(
      {
        method: request.method,
        path,
        query,
        client: request.ip,
        protocol: request.protocol,
        httpVersion: request.raw.httpVersion,
        headers: snapshotHeaders(request.headers, options.headersMode, options.redact)
      },
      'request received'
    );
  });

  app.addHook('preHandler', async (request) => {
    const body = truncateBody(request.body, options.bodyMaxBytes);
    if (body !== null) {
      request.log.info({ body, bodyMaxBytes: options.bodyMaxBytes }, 'request body');
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = request.requestLogStart;
    const durationMs = start ? Number((process.hrtime.bigint() - start) / 1_000_000n) : null;
    const headers = reply.getHeaders();
    request.log.info(
      {
        method: request.method,
        path: splitUrl(request.url).path,
        statusCode: reply.statusCode,
        durationMs,
        contentType: stringifyHeader(headers['content-type']),
        contentLength: stringifyHeader(headers['content-length']),
        responseHeaders: options.responseHeaders ? snapshotHeaders(headers, 'all', options.redact) : undefined
      },
      'request completed'
    );
  });
});
