import type { FastifyInstance } from 'fastify';
import type { HubContext } from '../context';
import { HubError } from '../errors';
import type { FileRequestMethod } from '../files/fileServer';
import { sendError } from './errors';
import { parseResolvePath } from './repoPaths';

type ResolveRouteParams = {
  '*': string;
};

function readRangeHeader(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export async function registerResolveRoutes(app: FastifyInstance, context: HubContext): Promise<void> {
  app.route<{ Params: ResolveRouteParams }>({
    method: ['GET', 'HEAD'],
    url: '/*',
    handler: async (request, reply) => {
      try {
        const target = parseResolvePath(request.params['*'] ?? '');
        if (!target) {
          throw new HubError('Not Found', 'ENTRY_NOT_FOUND', { url: request.url });
        }
        const method: FileRequestMethod = request.method === 'HEAD' ? 'HEAD' : 'GET';
        const response = await context.fileServer.serve({
          ...target,
          method,
          rangeHeader: readRangeHeader(request.headers.range)
        });

        reply.status(response.status).headers(response.headers);
        const body = response.body;
        if (!body) {
          return reply.send('');
        }
        const kind = response.kind;
        const bodyLength = response.bodyLength;
        body.once('end', () => {
          app.metrics.servedBytesTotal.labels(kind).inc(bodyLength);
        });
        return reply.send(body);
      } catch (err) {
        return sendError(reply, err);
      }
    }
  });
}
