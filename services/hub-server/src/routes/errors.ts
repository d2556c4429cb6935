import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { HubError } from '../errors';

export type ErrorPayload = {
  detail: string;
};

// Range and body headers set before a failure must not leak into the error response.
const CONTENT_HEADERS = [
  'content-type',
  'content-length',
  'content-range',
  'content-disposition',
  'last-modified',
  'x-lfs-size',
  'etag'
];

export function mapHubErrorToHttpStatus(err: HubError): number {
  switch (err.code) {
    case 'REPO_NOT_FOUND':
    case 'ENTRY_NOT_FOUND':
    case 'OUT_OF_BOUNDS':
      return 404;
    case 'INVALID_REQUEST':
      return 400;
    case 'IO_ERROR':
      return 500;
    default:
      return 500;
  }
}

function clearContentHeaders(reply: FastifyReply): void {
  const raw = reply.raw;
  for (const header of CONTENT_HEADERS) {
    reply.removeHeader(header);
    // A stream reply copies its headers onto the raw response before the first byte.
    if (!raw.headersSent) {
      raw.removeHeader(header);
    }
  }
}

export function sendError(reply: FastifyReply, err: unknown) {
  if (reply.sent) {
    reply.log.error({ err }, 'error after response was sent');
    return reply;
  }
  clearContentHeaders(reply);

  if (err instanceof HubError) {
    const status = mapHubErrorToHttpStatus(err);
    if (status >= 500) {
      reply.log.error({ err, code: err.code, details: err.details }, 'hub server request failed');
      return reply.status(status).send({ detail: 'Internal server error' } satisfies ErrorPayload);
    }
    reply.log.debug({ code: err.code, details: err.details }, err.message);
    return reply.status(status).send({ detail: err.message } satisfies ErrorPayload);
  }

  if (err instanceof z.ZodError) {
    return reply.status(400).send({ detail: 'Request validation failed' } satisfies ErrorPayload);
  }

  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') {
    const statusCode = err.statusCode;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({ detail: err.message } satisfies ErrorPayload);
    }
  }

  reply.log.error({ err }, 'unhandled error in hub server route');
  return reply.status(500).send({ detail: 'Internal server error' } satisfies ErrorPayload);
}

export function createErrorHandler() {
  return function hubErrorHandler(error: FastifyError | Error, _request: FastifyRequest, reply: FastifyReply) {
    return sendError(reply, error);
  };
}

export function createNotFoundHandler() {
  return function hubNotFoundHandler(_request: FastifyRequest, reply: FastifyReply) {
    return reply.status(404).send({ detail: 'Not Found' } satisfies ErrorPayload);
  };
}
