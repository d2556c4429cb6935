import type { PathInfoCollector } from '../pathsInfo/collector';
import { resolveRepoRoot } from '../repos/repoRoot';

const EPOCH_TIMESTAMP = '1970-01-01T00:00:00.000Z';
const DEFAULT_SHA = 'fakesha1234567890';
const LOCAL_AUTHOR = 'local-user';

export type Sibling = {
  rfilename: string;
};

export type ModelInfo = {
  _id: string;
  id: string;
  private: boolean;
  pipeline_tag: string;
  library_name: string;
  tags: string[];
  downloads: number;
  likes: number;
  modelId: string;
  author: string;
  sha: string;
  lastModified: string;
  createdAt: string;
  gated: boolean;
  disabled: boolean;
  widgetData: Array<{ text: string }>;
  'model-index': null;
  config: {
    architectures: string[];
    model_type: string;
    tokenizer_config: Record<string, never>;
  };
  cardData: {
    language: string;
    tags: string[];
    license: string;
  };
  transformersInfo: {
    auto_model: string;
    pipeline_tag: string;
    processor: string;
  };
  safetensors: {
    parameters: Record<string, number>;
    total: number;
  };
  siblings: Sibling[];
  spaces: string[];
  usedStorage: number;
};

export type DatasetInfo = {
  _id: string;
  id: string;
  private: boolean;
  tags: string[];
  downloads: number;
  likes: number;
  author: string;
  sha: string;
  lastModified: string;
  createdAt: string;
  gated: boolean;
  disabled: boolean;
  cardData: {
    license: string;
    language: string[];
  };
  siblings: Sibling[];
  usedStorage: number;
};

type RepoListing = {
  siblings: Sibling[];
  usedStorage: number;
};

export function fakeSha(revision?: string): string {
  return revision ? `fakesha-${revision}` : DEFAULT_SHA;
}

async function listRepo(collector: PathInfoCollector, repoRoot: string): Promise<RepoListing> {
  const files = await collector.listFiles(repoRoot);
  return {
    siblings: files.map((file) => ({ rfilename: file.path })),
    usedStorage: files.reduce((total, file) => total + file.size, 0)
  };
}

export async function buildModelInfo(
  collector: PathInfoCollector,
  hubRoot: string,
  repoId: string,
  revision?: string
): Promise<ModelInfo> {
  const repoRoot = await resolveRepoRoot(hubRoot, { kind: 'model', repoId });
  const { siblings, usedStorage } = await listRepo(collector, repoRoot);
  return {
    _id: `local/${repoId}`,
    id: repoId,
    private: false,
    pipeline_tag: 'text-generation',
    library_name: 'transformers',
    tags: ['transformers', 'gpt2', 'text-generation'],
    downloads: 0,
    likes: 0,
    modelId: repoId,
    author: LOCAL_AUTHOR,
    sha: fakeSha(revision),
    lastModified: EPOCH_TIMESTAMP,
    createdAt: EPOCH_TIMESTAMP,
    gated: false,
    disabled: false,
    widgetData: [{ text: 'Hello' }],
    'model-index': null,
    config: {
      architectures: ['GPT2LMHeadModel'],
      model_type: 'gpt2',
      tokenizer_config: {}
    },
    cardData: { language: 'en', tags: ['example'], license: 'mit' },
    transformersInfo: {
      auto_model: 'AutoModelForCausalLM',
      pipeline_tag: 'text-generation',
      processor: 'AutoTokenizer'
    },
    safetensors: { parameters: { F32: 0 }, total: 0 },
    siblings,
    spaces: [],
    usedStorage
  };
}

export async function buildDatasetInfo(
  collector: PathInfoCollector,
  hubRoot: string,
  repoId: string,
  revision?: string
): Promise<DatasetInfo> {
  const repoRoot = await resolveRepoRoot(hubRoot, { kind: 'dataset', repoId });
  const { siblings, usedStorage } = await listRepo(collector, repoRoot);
  return {
    _id: `local/datasets/${repoId}`,
    id: repoId,
    private: false,
    tags: ['dataset'],
    downloads: 0,
    likes: 0,
    author: LOCAL_AUTHOR,
    sha: fakeSha(revision),
    lastModified: EPOCH_TIMESTAMP,
    createdAt: EPOCH_TIMESTAMP,
    gated: false,
    disabled: false,
    cardData: { license: 'mit', language: ['en'] },
    siblings,
    usedStorage
  };
}
