import type { FastifyInstance } from 'fastify';
import { repoKindPlural, type RepoKind } from '@hubstub/shared';
import type { HubContext } from '../context';
import { HubError } from '../errors';
import { buildDatasetInfo, buildModelInfo } from '../metadata/repoInfo';
import { collectPathsInfo, parsePathsInfoBody } from '../pathsInfo/request';
import { findRepoRoot, resolveRepoRoot } from '../repos/repoRoot';
import { sendError } from './errors';
import { parsePathsInfoPath, parseRepoApiPath, selectRepoApiTarget } from './repoPaths';

type RepoApiParams = {
  '*': string;
};

type TreeQuery = {
  recursive?: string | string[];
};

function isTruthyFlag(value: string | string[] | undefined): boolean {
  const raw = Array.isArray(value) ? value[value.length - 1] : value;
  if (raw === undefined) {
    return false;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function routeNotFound(url: string): HubError {
  return new HubError('Not Found', 'ENTRY_NOT_FOUND', { url });
}

function registerRepoApiRoutes(app: FastifyInstance, context: HubContext, kind: RepoKind): void {
  const prefix = `/api/${repoKindPlural(kind)}`;
  const { hubRoot } = context.config;

  app.get<{ Params: RepoApiParams; Querystring: TreeQuery }>(`${prefix}/*`, async (request, reply) => {
    try {
      const target = await selectRepoApiTarget(
        parseRepoApiPath(request.params['*'] ?? ''),
        async (repoId) => (await findRepoRoot(hubRoot, { kind, repoId })) !== null
      );
      if (!target) {
        throw routeNotFound(request.url);
      }
      if (target.action === 'tree') {
        const repoRoot = await resolveRepoRoot(hubRoot, { kind, repoId: target.repoId });
        const records = await context.collector.collect(repoRoot, target.path, {
          recursive: isTruthyFlag(request.query.recursive),
          includeSelf: false
        });
        return reply.send(records);
      }
      const info =
        kind === 'dataset'
          ? await buildDatasetInfo(context.collector, hubRoot, target.repoId, target.revision)
          : await buildModelInfo(context.collector, hubRoot, target.repoId, target.revision);
      return reply.send(info);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post<{ Params: RepoApiParams }>(`${prefix}/*`, async (request, reply) => {
    try {
      const target = parsePathsInfoPath(request.params['*'] ?? '');
      if (!target) {
        throw routeNotFound(request.url);
      }
      const repoRoot = await resolveRepoRoot(hubRoot, { kind, repoId: target.repoId });
      const query = parsePathsInfoBody(request.body);
      const records = await collectPathsInfo(context.collector, repoRoot, query);
      return reply.send(records);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}

export async function registerApiRoutes(app: FastifyInstance, context: HubContext): Promise<void> {
  registerRepoApiRoutes(app, context, 'model');
  registerRepoApiRoutes(app, context, 'dataset');
}
