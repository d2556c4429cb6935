import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { symlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, test } from 'node:test';
import { PATHS_INFO_SIDECAR_FILENAME, parsePathsInfoSidecar, type FileDigests } from '@hubstub/shared';
import { createHashCache } from '../src/hashing/hashCache';
import { createPathInfoCollector, type PathInfoRecord } from '../src/pathsInfo/collector';
import { collectPathsInfo, dedupePathInfo, parsePathsInfoBody } from '../src/pathsInfo/request';
import { isTrustedSidecarEntry } from '../src/pathsInfo/sidecar';
import { CONFIG_BYTES, VOCAB_TEXT, createHubFixture, type HubFixture } from './helpers/fixtures';

function sha1(content: string | Buffer): string {
  return createHash('sha1').update(content).digest('hex');
}

function sha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function stubDigests(): FileDigests {
  return { sha1: 'stub-sha1', sha256: 'stub-sha256' };
}

function pathsOf(records: PathInfoRecord[]): string[] {
  return records.map((record) => `${record.type}:${record.path}`);
}

describe('path info collector', () => {
  let fixture: HubFixture;

  before(async () => {
    fixture = await createHubFixture();
  });

  after(async () => {
    await fixture.cleanup();
  });

  test('lists the whole repository sorted by path', async () => {
    const collector = createPathInfoCollector({
      hashCache: createHashCache({ compute: async () => stubDigests() }),
      computeDigests: true
    });
    const records = await collector.collect(fixture.modelRoot);
    assert.deepEqual(pathsOf(records), [
      'file:config.json',
      'file:model.bin',
      'directory:nested',
      'file:nested/vocab.txt'
    ]);
  });

  test('computes digests for files without a sidecar entry', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: true });
    const records = await collector.collect(fixture.modelRoot, 'nested/vocab.txt');
    assert.deepEqual(records, [
      {
        path: 'nested/vocab.txt',
        type: 'file',
        size: VOCAB_TEXT.length,
        oid: sha1(VOCAB_TEXT),
        lfs: { oid: `sha256:${sha256(VOCAB_TEXT)}`, size: VOCAB_TEXT.length }
      }
    ]);
  });

  test('reports sizes only when digests are disabled', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    const records = await collector.collect(fixture.modelRoot, 'config.json');
    assert.deepEqual(records, [{ path: 'config.json', type: 'file', size: 100 }]);
  });

  test('includes a named directory, its subdirectories and files', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    assert.deepEqual(pathsOf(await collector.collect(fixture.modelRoot, 'nested/')), [
      'directory:nested',
      'file:nested/vocab.txt'
    ]);
    assert.deepEqual(pathsOf(await collector.collect(fixture.modelRoot, 'nested', { includeSelf: false })), [
      'file:nested/vocab.txt'
    ]);
  });

  test('walks only direct children when not recursive', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    const records = await collector.collect(fixture.datasetRoot, '', { recursive: false });
    assert.deepEqual(pathsOf(records), ['file:README.md', 'directory:data']);
  });

  test('returns nothing for missing or escaping paths', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    assert.deepEqual(await collector.collect(fixture.modelRoot, 'missing'), []);
    assert.deepEqual(await collector.collect(fixture.modelRoot, '../../secret.txt'), []);
    assert.deepEqual(await collector.collect(path.join(fixture.modelRoot, 'absent-dir')), []);
  });

  test('describes a single entry without expanding it', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    assert.deepEqual(await collector.describe(fixture.modelRoot, 'nested'), { path: 'nested', type: 'directory' });
    assert.deepEqual(await collector.describe(fixture.modelRoot, 'config.json'), {
      path: 'config.json',
      type: 'file',
      size: 100
    });
    assert.equal(await collector.describe(fixture.modelRoot, 'missing'), null);
  });

  test('lists linked files inside the root but does not follow linked directories', async () => {
    const linkedFixture = await createHubFixture();
    try {
      await symlink(
        path.join(linkedFixture.modelRoot, 'config.json'),
        path.join(linkedFixture.modelRoot, 'config-link.json')
      );
      await symlink(path.join(linkedFixture.modelRoot, 'nested'), path.join(linkedFixture.modelRoot, 'nested-link'));
      await symlink(
        path.join(linkedFixture.hubRoot, '..', 'secret.txt'),
        path.join(linkedFixture.modelRoot, 'secret-link.txt')
      );
      const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
      assert.deepEqual(await collector.listFiles(linkedFixture.modelRoot), [
        { path: 'config-link.json', size: 100 },
        { path: 'config.json', size: 100 },
        { path: 'model.bin', size: 32 },
        { path: 'nested/vocab.txt', size: VOCAB_TEXT.length }
      ]);
      assert.equal(await collector.describe(linkedFixture.modelRoot, 'secret-link.txt'), null);
    } finally {
      await linkedFixture.cleanup();
    }
  });
});

describe('paths-info sidecar', () => {
  let fixture: HubFixture;

  before(async () => {
    fixture = await createHubFixture();
    await writeFile(
      path.join(fixture.modelRoot, PATHS_INFO_SIDECAR_FILENAME),
      JSON.stringify({
        version: 1,
        entries: [
          {
            path: 'config.json',
            type: 'file',
            size: 100,
            oid: 'precomputed-sha1',
            etag: 'precomputed-sha1',
            lfs: { oid: 'sha256:precomputed', size: 100 }
          },
          {
            path: 'model.bin',
            type: 'file',
            size: 5,
            oid: 'stale-sha1',
            lfs: { oid: 'sha256:stale', size: 5 }
          },
          { path: 'nested/vocab.txt', type: 'file', size: VOCAB_TEXT.length, oid: 'only-sha1' }
        ]
      })
    );
  });

  after(async () => {
    await fixture.cleanup();
  });

  test('uses trusted sidecar digests and recomputes the rest', async () => {
    const collector = createPathInfoCollector({
      hashCache: createHashCache({ compute: async () => stubDigests() }),
      computeDigests: true
    });
    const records = await collector.collect(fixture.modelRoot);
    assert.deepEqual(records, [
      {
        path: 'config.json',
        type: 'file',
        size: 100,
        oid: 'precomputed-sha1',
        lfs: { oid: 'sha256:precomputed', size: 100 }
      },
      {
        path: 'model.bin',
        type: 'file',
        size: 32,
        oid: 'stub-sha1',
        lfs: { oid: 'sha256:stub-sha256', size: 32 }
      },
      { path: 'nested', type: 'directory' },
      {
        path: 'nested/vocab.txt',
        type: 'file',
        size: VOCAB_TEXT.length,
        oid: 'stub-sha1',
        lfs: { oid: 'sha256:stub-sha256', size: VOCAB_TEXT.length }
      }
    ]);
  });

  test('trusted entries apply even when digests are disabled', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    assert.deepEqual(await collector.collect(fixture.modelRoot, 'config.json'), [
      {
        path: 'config.json',
        type: 'file',
        size: 100,
        oid: 'precomputed-sha1',
        lfs: { oid: 'sha256:precomputed', size: 100 }
      }
    ]);
  });

  test('never reports the sidecar itself', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    assert.deepEqual(await collector.collect(fixture.modelRoot, PATHS_INFO_SIDECAR_FILENAME), []);
    assert.equal(await collector.describe(fixture.modelRoot, PATHS_INFO_SIDECAR_FILENAME), null);
    const files = await collector.listFiles(fixture.modelRoot);
    assert.deepEqual(
      files.map((file) => file.path),
      ['config.json', 'model.bin', 'nested/vocab.txt']
    );
  });

  test('ignores a sidecar that is not valid JSON', async () => {
    const broken = await createHubFixture();
    try {
      await writeFile(path.join(broken.modelRoot, PATHS_INFO_SIDECAR_FILENAME), '{not json');
      const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: true });
      assert.deepEqual(await collector.collect(broken.modelRoot, 'config.json'), [
        {
          path: 'config.json',
          type: 'file',
          size: 100,
          oid: sha1(CONFIG_BYTES),
          lfs: { oid: `sha256:${sha256(CONFIG_BYTES)}`, size: 100 }
        }
      ]);
    } finally {
      await broken.cleanup();
    }
  });

  test('parses only well-formed file entries', () => {
    const index = parsePathsInfoSidecar({
      version: 1,
      entries: [
        { path: 'a.bin', type: 'file', size: 1, oid: 'x', lfs: { oid: 'sha256:y', size: 1 } },
        { path: 'dir', type: 'directory' },
        { type: 'file', size: 3 },
        'not an entry'
      ]
    });
    assert.deepEqual([...index.keys()], ['a.bin']);
    assert.equal(parsePathsInfoSidecar({ entries: 'nope' }).size, 0);
    assert.equal(parsePathsInfoSidecar(null).size, 0);
  });

  test('trusts entries only with a matching size and both digests', () => {
    const entry = { path: 'a.bin', type: 'file', size: 10, oid: 'x', lfs: { oid: 'sha256:y', size: 10 } };
    assert.equal(isTrustedSidecarEntry(entry, 10), true);
    assert.equal(isTrustedSidecarEntry(entry, 11), false);
    assert.equal(isTrustedSidecarEntry({ path: 'a.bin', type: 'file', size: 10, oid: 'x' }, 10), false);
    assert.equal(isTrustedSidecarEntry({ path: 'a.bin', type: 'file', size: 10, lfs: { oid: 'sha256:y' } }, 10), false);
  });
});

describe('paths-info requests', () => {
  let fixture: HubFixture;

  before(async () => {
    fixture = await createHubFixture();
  });

  after(async () => {
    await fixture.cleanup();
  });

  test('reads bodies leniently', () => {
    assert.deepEqual(parsePathsInfoBody(undefined), { paths: [], expand: true });
    assert.deepEqual(parsePathsInfoBody('not json'), { paths: [], expand: true });
    assert.deepEqual(parsePathsInfoBody([1, 2]), { paths: [], expand: true });
    assert.deepEqual(parsePathsInfoBody({ paths: ['a', 3, 'b'], expand: 'no' }), { paths: ['a', 'b'], expand: true });
    assert.deepEqual(parsePathsInfoBody({ paths: 'a', expand: false }), { paths: [], expand: false });
  });

  test('lists everything for an empty path list or a root alias', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    const everything = await collectPathsInfo(collector, fixture.modelRoot, { paths: [], expand: true });
    const viaAliases = await collectPathsInfo(collector, fixture.modelRoot, { paths: ['/', '.', ''], expand: true });
    assert.deepEqual(viaAliases, everything);
    assert.equal(everything.length, 4);
  });

  test('merges overlapping requests without duplicates', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    const records = await collectPathsInfo(collector, fixture.modelRoot, {
      paths: ['nested', 'nested/vocab.txt', 'missing', 'config.json'],
      expand: true
    });
    assert.deepEqual(pathsOf(records), ['directory:nested', 'file:nested/vocab.txt', 'file:config.json']);
  });

  test('describes requested entries without expanding directories', async () => {
    const collector = createPathInfoCollector({ hashCache: createHashCache(), computeDigests: false });
    const records = await collectPathsInfo(collector, fixture.modelRoot, {
      paths: ['nested', '/', 'config.json'],
      expand: false
    });
    assert.deepEqual(records, [
      { path: 'nested', type: 'directory' },
      { path: '', type: 'directory' },
      { path: 'config.json', type: 'file', size: 100 }
    ]);
  });

  test('dedupes on type and path', () => {
    assert.deepEqual(
      dedupePathInfo([
        { path: 'a', type: 'directory' },
        { path: 'a', type: 'directory' },
        { path: 'b', type: 'file', size: 1 }
      ]),
      [
        { path: 'a', type: 'directory' },
        { path: 'b', type: 'file', size: 1 }
      ]
    );
  });
});
