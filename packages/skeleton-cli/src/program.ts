import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { PATHS_INFO_SIDECAR_FILENAME, type RepoKind } from '@hubstub/shared';
import { SkeletonError } from './errors';
import {
  DEFAULT_FILL_SIZE_BYTES,
  applyFilters,
  destinationRoot,
  generateSkeleton,
  parseSize,
  type FillOptions
} from './skeleton';
import { writePathsInfoSidecar } from './sidecarWriter';
import { HubTreeClient, type RemoteTreeFile, type TreeClient } from './treeClient';

const DEFAULT_ENDPOINT = 'https://huggingface.co';
const DEFAULT_HUB_ROOT = 'fixtures';
const DEFAULT_TIMEOUT_MS = 30_000;

export type SkeletonCommandOptions = {
  repoType: RepoKind;
  revision: string;
  endpoint: string;
  token?: string;
  include: string[];
  exclude: string[];
  maxFiles?: number;
  dst?: string;
  root: string;
  force?: boolean;
  dryRun?: boolean;
  fill?: boolean;
  fillSize?: string;
  fillContent?: string;
  json?: boolean;
};

export type SkeletonSummary = {
  repoId: string;
  repoType: RepoKind;
  revision: string;
  root: string;
  sidecar: string | null;
  dryRun: boolean;
  files: string[];
};

type CliDependencies = {
  treeClientFactory?: (options: SkeletonCommandOptions) => TreeClient;
};

function createTreeClient(options: SkeletonCommandOptions): TreeClient {
  return new HubTreeClient({
    endpoint: options.endpoint,
    token: options.token,
    userAgent: 'hubstub-skeleton/0.1.0',
    fetchTimeoutMs: DEFAULT_TIMEOUT_MS
  });
}

function collectValues(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseMaxFiles(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function resolveFill(options: SkeletonCommandOptions): FillOptions | null {
  if (!options.fill) {
    return null;
  }
  let sizeBytes = DEFAULT_FILL_SIZE_BYTES;
  if (options.fillSize !== undefined) {
    try {
      sizeBytes = parseSize(options.fillSize);
    } catch (err) {
      throw new SkeletonError(`invalid --fill-size: ${describeError(err)}`, { cause: err });
    }
  }
  return { sizeBytes, pattern: Buffer.from(options.fillContent ?? '', 'utf8') };
}

async function fetchRemoteFiles(
  client: TreeClient,
  repoId: string,
  options: SkeletonCommandOptions
): Promise<RemoteTreeFile[]> {
  const label = options.repoType === 'dataset' ? 'Dataset' : 'Model';
  const unavailable = `${label} tree unavailable or empty for '${repoId}' at ${options.revision} (${options.endpoint})`;
  let files: RemoteTreeFile[];
  try {
    files = await client.listRepoFiles({ repoType: options.repoType, repoId, revision: options.revision });
  } catch (err) {
    throw new SkeletonError(`${unavailable}: ${describeError(err)}`, { cause: err });
  }
  if (files.length === 0) {
    throw new SkeletonError(unavailable);
  }
  return files;
}

/**
 * Mirrors the file layout of a remote repository under the hub root, with placeholder
 * content, then records a paths-info sidecar for the files written.
 */
export async function runSkeleton(
  repoId: string,
  options: SkeletonCommandOptions,
  client: TreeClient
): Promise<SkeletonSummary> {
  const fill = resolveFill(options);
  const remoteFiles = await fetchRemoteFiles(client, repoId, options);
  const files = applyFilters(remoteFiles, {
    include: options.include,
    exclude: options.exclude,
    maxFiles: options.maxFiles
  });
  const dryRun = Boolean(options.dryRun);
  const { root, created } = await generateSkeleton({
    root: options.dst ?? destinationRoot(options.root, options.repoType, repoId),
    files,
    force: options.force,
    dryRun,
    fill
  });

  let sidecar: string | null = null;
  try {
    sidecar = await writePathsInfoSidecar(root, created, dryRun);
  } catch (err) {
    console.error(`Warning: failed to write ${PATHS_INFO_SIDECAR_FILENAME}: ${describeError(err)}`);
  }

  return {
    repoId,
    repoType: options.repoType,
    revision: options.revision,
    root,
    sidecar,
    dryRun,
    files: created.map((filePath) => path.relative(root, filePath))
  };
}

function printSummary(summary: SkeletonSummary, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  if (summary.sidecar) {
    console.log(`Wrote sidecar: ${summary.sidecar}`);
  }
  console.log(`Skeleton root: ${summary.root}`);
  console.log(`Files: ${summary.files.length}`);
  for (const file of summary.files) {
    console.log(`  ${file}`);
  }
}

export function createInterface(deps: CliDependencies = {}): Command {
  const treeClientFactory = deps.treeClientFactory ?? createTreeClient;
  const defaultEndpoint = (process.env.HUBSTUB_REMOTE_ENDPOINT || DEFAULT_ENDPOINT).replace(/\/+$/, '');
  const defaultRoot = process.env.HUBSTUB_ROOT || DEFAULT_HUB_ROOT;

  const program = new Command();
  program
    .name('hubstub-skeleton')
    .description('Mirror a remote repository layout locally with placeholder files')
    .argument('<repoId>', "Repository id, e.g. 'gpt2' or 'org/name'")
    .addOption(
      new Option('-t, --repo-type <type>', 'Repository type').choices(['model', 'dataset']).makeOptionMandatory()
    )
    .option('-r, --revision <revision>', 'Revision, branch or commit', 'main')
    .option('-e, --endpoint <url>', 'Remote hub endpoint', defaultEndpoint)
    .option('--token <token>', 'Access token for the remote hub', process.env.HUBSTUB_TOKEN)
    .option('--include <glob>', 'Only keep paths matching the glob (repeatable)', collectValues, [])
    .option('--exclude <glob>', 'Drop paths matching the glob (repeatable)', collectValues, [])
    .option('--max-files <n>', 'Keep at most this many files', parseMaxFiles)
    .option('--dst <dir>', 'Destination root, overriding the hub layout')
    .option('--root <dir>', 'Hub root the default destination is derived from', defaultRoot)
    .option('--force', 'Overwrite existing files', false)
    .option('--dry-run', 'Report what would be written without touching the disk', false)
    .option('--fill', 'Fill files with repeated content instead of leaving them empty', false)
    .option('--fill-size <size>', "Size of each filled file, e.g. '16MiB' (implies nothing without --fill)")
    .option('--fill-content <text>', 'Text repeated to fill files (default: zero bytes)')
    .option('--json', 'Print a JSON summary', false)
    .exitOverride()
    .action(async (repoId: string, options: SkeletonCommandOptions) => {
      const summary = await runSkeleton(repoId, options, treeClientFactory(options));
      printSummary(summary, options.json);
    });

  return program;
}
