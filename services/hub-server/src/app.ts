import { randomUUID } from 'node:crypto';
import fastify, { type FastifyRequest } from 'fastify';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import type { HubContext } from './context';
import { createFileServer } from './files/fileServer';
import { createHashCache, type HashCache } from './hashing/hashCache';
import { createLoggerOptions } from './logger';
import { createPathInfoCollector } from './pathsInfo/collector';
import { metricsPlugin } from './plugins/metrics';
import { requestLoggingPlugin } from './plugins/requestLogging';
import { registerApiRoutes } from './routes/api';
import { createErrorHandler, createNotFoundHandler } from './routes/errors';
import { registerResolveRoutes } from './routes/resolve';
import { registerSystemRoutes } from './routes/system';

export type BuildAppOptions = {
  config?: ServiceConfig;
  hashCache?: HashCache;
};

export function generateRequestId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

// Bodies are read leniently: endpoints decide what an unusable body means.
function parseLenientJson(
  _request: FastifyRequest,
  body: string | Buffer,
  done: (err: Error | null, body?: unknown) => void
): void {
  const text = typeof body === 'string' ? body : body.toString('utf8');
  if (!text.trim()) {
    done(null, undefined);
    return;
  }
  try {
    done(null, JSON.parse(text));
  } catch {
    done(null, text);
  }
}

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = fastify({
    logger: createLoggerOptions(config.logLevel),
    disableRequestLogging: config.requestLogging.enabled,
    genReqId: generateRequestId
  });

  await app.register(metricsPlugin, { enabled: config.metricsEnabled });
  await app.register(requestLoggingPlugin, config.requestLogging);

  app.removeContentTypeParser(['application/json', 'text/plain']);
  app.addContentTypeParser(['application/json', 'text/plain'], { parseAs: 'string' }, parseLenientJson);
  app.addContentTypeParser('*', { parseAs: 'string' }, parseLenientJson);

  const hashCache =
    options?.hashCache ??
    createHashCache({
      maxEntries: config.hashCache.maxEntries,
      onLookup: (result) => {
        app.metrics.hashCacheLookupsTotal.labels(result).inc();
      }
    });

  const context: HubContext = {
    config,
    hashCache,
    fileServer: createFileServer({
      hubRoot: config.hubRoot,
      hashCache,
      lfsSuffixes: config.files.lfsSuffixes,
      probeEtag: config.files.probeEtag
    }),
    collector: createPathInfoCollector({
      hashCache,
      computeDigests: config.pathsInfo.computeDigests,
      logger: app.log
    })
  };

  app.setErrorHandler(createErrorHandler());
  app.setNotFoundHandler(createNotFoundHandler());

  await registerSystemRoutes(app, context);
  await registerApiRoutes(app, context);
  await registerResolveRoutes(app, context);

  return { app, config, context };
}
