import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { ServiceConfig } from '../../src/config/serviceConfig';

export const CONFIG_BYTES = Buffer.from(Array.from({ length: 100 }, (_, index) => index));
export const MODEL_BIN_BYTES = Buffer.alloc(32, 0xab);
export const VOCAB_TEXT = 'hello world\n';
export const TRAIN_CSV = 'id,text\n1,good\n2,bad\n';
export const DATASET_README = '# reviews\n';

export type HubFixture = {
  hubRoot: string;
  modelRoot: string;
  datasetRoot: string;
  cleanup: () => Promise<void>;
};

export async function writeFixtureFile(root: string, relativePath: string, content: string | Buffer): Promise<string> {
  const target = path.join(root, relativePath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, content);
  return target;
}

/**
 * Lays out a hub with one model (`gpt2`) and one dataset (`acme/reviews`), plus a
 * `secret.txt` next to the hub root that no request may reach.
 */
export async function createHubFixture(): Promise<HubFixture> {
  const workspace = await mkdtemp(path.join(tmpdir(), 'hubstub-fixture-'));
  const hubRoot = path.join(workspace, 'hub');
  const modelRoot = path.join(hubRoot, 'gpt2');
  const datasetRoot = path.join(hubRoot, 'datasets', 'acme', 'reviews');

  await writeFixtureFile(workspace, 'secret.txt', 'do not serve\n');
  await writeFixtureFile(modelRoot, 'config.json', CONFIG_BYTES);
  await writeFixtureFile(modelRoot, 'model.bin', MODEL_BIN_BYTES);
  await writeFixtureFile(modelRoot, 'nested/vocab.txt', VOCAB_TEXT);
  await writeFixtureFile(datasetRoot, 'data/train.csv', TRAIN_CSV);
  await writeFixtureFile(datasetRoot, 'README.md', DATASET_README);

  return {
    hubRoot,
    modelRoot,
    datasetRoot,
    cleanup: async () => {
      await rm(workspace, { recursive: true, force: true });
    }
  };
}

export function createTestConfig(hubRoot: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'fatal',
    hubRoot,
    metricsEnabled: false,
    files: {
      probeEtag: false,
      lfsSuffixes: ['.bin', '.safetensors']
    },
    pathsInfo: {
      computeDigests: true
    },
    hashCache: {
      maxEntries: 0
    },
    requestLogging: {
      enabled: false,
      bodyMaxBytes: 4096,
      headersMode: 'all',
      redact: true,
      responseHeaders: true
    },
    ...overrides
  };
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}
