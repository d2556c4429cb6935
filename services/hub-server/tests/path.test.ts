import assert from 'node:assert/strict';
import { rm, symlink } from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, test } from 'node:test';
import { isHubError } from '../src/errors';
import { locateRepoRoot, resolveRepoRoot } from '../src/repos/repoRoot';
import { boundPath, isWithinRoot, normalizeRelativePath, resolvePath } from '../src/utils/path';
import { createHubFixture, type HubFixture } from './helpers/fixtures';

describe('normalizeRelativePath', () => {
  test('strips leading slashes and collapses dot segments', () => {
    assert.equal(normalizeRelativePath('/config.json'), 'config.json');
    assert.equal(normalizeRelativePath('nested/./vocab.txt'), 'nested/vocab.txt');
    assert.equal(normalizeRelativePath('nested/../config.json'), 'config.json');
    assert.equal(normalizeRelativePath('nested/'), 'nested');
    assert.equal(normalizeRelativePath('nested\\vocab.txt'), 'nested/vocab.txt');
  });

  test('maps every spelling of the root to an empty path', () => {
    for (const input of ['', '/', '.', './', '//']) {
      assert.equal(normalizeRelativePath(input), '', JSON.stringify(input));
    }
  });

  test('keeps escaping segments visible', () => {
    assert.equal(normalizeRelativePath('../secret.txt'), '../secret.txt');
    assert.equal(normalizeRelativePath('a/../../secret.txt'), '../secret.txt');
  });
});

describe('boundPath', () => {
  const root = path.resolve('/srv/hub/gpt2');

  test('joins paths that stay inside the root', () => {
    assert.deepEqual(boundPath(root, 'nested/vocab.txt'), {
      absolutePath: path.join(root, 'nested', 'vocab.txt'),
      relativePath: 'nested/vocab.txt'
    });
    assert.deepEqual(boundPath(root, '/'), { absolutePath: root, relativePath: '' });
  });

  test('rejects escapes and NUL bytes', () => {
    assert.equal(boundPath(root, '../secret.txt'), null);
    assert.equal(boundPath(root, 'nested/../../secret.txt'), null);
    assert.equal(boundPath(root, '..\\secret.txt'), null);
    assert.equal(boundPath(root, 'config.json\0.txt'), null);
  });

  test('does not treat a sibling with a shared prefix as inside', () => {
    assert.equal(isWithinRoot(root, `${root}-other${path.sep}file`), false);
    assert.equal(isWithinRoot(root, root), true);
  });
});

describe('resolvePath and repository roots', () => {
  let fixture: HubFixture;

  before(async () => {
    fixture = await createHubFixture();
  });

  after(async () => {
    await fixture.cleanup();
  });

  test('reports found entries with their stats', async () => {
    const resolution = await resolvePath(fixture.modelRoot, 'config.json');
    assert.equal(resolution.status, 'found');
    if (resolution.status === 'found') {
      assert.equal(resolution.stats.size, 100);
      assert.equal(resolution.relativePath, 'config.json');
    }
  });

  test('distinguishes missing entries from escapes', async () => {
    const missing = await resolvePath(fixture.modelRoot, 'missing.json');
    assert.equal(missing.status, 'not_found');
    const escaped = await resolvePath(fixture.modelRoot, '../../secret.txt');
    assert.deepEqual(escaped, { status: 'out_of_bounds' });
  });

  test('treats links that leave the root as escapes', async () => {
    const outside = path.join(fixture.modelRoot, 'outside.txt');
    const inside = path.join(fixture.modelRoot, 'inside.json');
    await symlink(path.join(fixture.hubRoot, '..', 'secret.txt'), outside);
    await symlink(path.join(fixture.modelRoot, 'config.json'), inside);
    try {
      assert.deepEqual(await resolvePath(fixture.modelRoot, 'outside.txt'), { status: 'out_of_bounds' });
      const linked = await resolvePath(fixture.modelRoot, 'inside.json');
      assert.equal(linked.status, 'found');
    } finally {
      await rm(outside);
      await rm(inside);
    }
  });

  test('treats a path through a file as missing', async () => {
    const resolution = await resolvePath(fixture.modelRoot, 'config.json/inner');
    assert.equal(resolution.status, 'not_found');
  });

  test('locates model and dataset roots in their namespaces', () => {
    assert.equal(locateRepoRoot(fixture.hubRoot, { kind: 'model', repoId: 'gpt2' }), fixture.modelRoot);
    assert.equal(
      locateRepoRoot(fixture.hubRoot, { kind: 'dataset', repoId: 'acme/reviews' }),
      fixture.datasetRoot
    );
    assert.equal(locateRepoRoot(fixture.hubRoot, { kind: 'model', repoId: '..' }), null);
    assert.equal(locateRepoRoot(fixture.hubRoot, { kind: 'dataset', repoId: '../gpt2' }), null);
    assert.equal(locateRepoRoot(fixture.hubRoot, { kind: 'model', repoId: '/' }), null);
  });

  test('rejects repositories that are missing or are not directories', async () => {
    assert.equal(await resolveRepoRoot(fixture.hubRoot, { kind: 'model', repoId: 'gpt2' }), fixture.modelRoot);

    await assert.rejects(resolveRepoRoot(fixture.hubRoot, { kind: 'model', repoId: 'nope' }), (err: unknown) => {
      assert.ok(isHubError(err, 'REPO_NOT_FOUND'));
      assert.equal(err.message, 'Repository not found');
      return true;
    });
    await assert.rejects(
      resolveRepoRoot(fixture.hubRoot, { kind: 'model', repoId: 'gpt2/config.json' }),
      (err: unknown) => isHubError(err, 'REPO_NOT_FOUND')
    );
    await assert.rejects(
      resolveRepoRoot(fixture.hubRoot, { kind: 'dataset', repoId: 'acme/none' }),
      (err: unknown) => isHubError(err, 'REPO_NOT_FOUND') && err.message === 'Dataset not found'
    );
  });
});
