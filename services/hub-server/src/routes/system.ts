import type { FastifyInstance } from 'fastify';
import type { HubContext } from '../context';
import { statOptional } from '../utils/path';

export async function registerSystemRoutes(app: FastifyInstance, context: HubContext): Promise<void> {
  async function healthCheck() {
    const stats = await statOptional(context.config.hubRoot);
    return {
      status: 'ok',
      hubRoot: { exists: stats?.isDirectory() ?? false }
    };
  }

  app.get('/healthz', healthCheck);
  app.get('/health', healthCheck);
}
