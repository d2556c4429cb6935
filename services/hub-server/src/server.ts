import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';
import { statOptional } from './utils/path';

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const { app } = await buildApp({ config });

  const hubRootStats = await statOptional(config.hubRoot);
  if (!hubRootStats?.isDirectory()) {
    app.log.warn({ hubRoot: config.hubRoot }, 'hub root does not exist; every repository will be reported missing');
  }
  app.log.info({ hubRoot: config.hubRoot }, 'serving repositories from hub root');

  try {
    await app.listen({ host: config.host, port: config.port });
    app.log.info({ host: config.host, port: config.port }, 'hub server listening');
  } catch (err) {
    app.log.error({ err }, 'failed to start hub server');
    await app.close();
    throw err;
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down hub server');
    try {
      await app.close();
    } catch (closeErr) {
      app.log.error({ err: closeErr }, 'error during hub server shutdown');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
}

start().catch((err) => {
  console.error('[hub-server] fatal startup error', err);
  process.exit(1);
});
