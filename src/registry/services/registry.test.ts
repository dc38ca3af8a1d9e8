/**
 * Unit tests for RegistryService
 */

import * as fs from 'fs';
import { RegistryConfig } from '../../config';
import { FakeSharedCache, TestRegistry, createTestRegistry, imageManifest, tempRoot, testConfig } from '../../test-utils';
import { DeniedError, SessionNotFoundError, UnauthorizedError } from '../errors';
import { ANONYMOUS } from '../types/registry';
import { MediaTypes } from '../types/manifest';
import { computeDigest } from './digest';

describe('RegistryService', () => {
  let root: string;
  let env: TestRegistry;

  const alice = { username: 'alice' };
  const v1 = imageManifest(Buffer.from('config'), [Buffer.from('layer-1')]);
  const v2 = imageManifest(Buffer.from('config'), [Buffer.from('layer-2')]);

  function setup(overrides: Partial<RegistryConfig> = {}, shared?: FakeSharedCache): TestRegistry {
    env = createTestRegistry(testConfig(root, overrides), shared);
    return env;
  }

  beforeEach(() => {
    root = tempRoot('registry');
  });

  afterEach(async () => {
    await env.registry.close();
    env.db.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  test('should reflect writes in the next tag listing and manifest read', async () => {
    const { registry } = setup();

    await registry.putManifest(alice, 'myapp', 'latest', v1, MediaTypes.OCI_MANIFEST);
    expect((await registry.listTags(alice, 'myapp')).items).toEqual(['latest']);
    expect((await registry.getManifest(alice, 'myapp', 'latest')).digest).toBe(computeDigest(v1));

    await registry.putManifest(alice, 'myapp', 'v2', v2, MediaTypes.OCI_MANIFEST);
    await registry.putManifest(alice, 'myapp', 'latest', v2, MediaTypes.OCI_MANIFEST);
    expect((await registry.listTags(alice, 'myapp')).items).toEqual(['latest', 'v2']);
    expect((await registry.getManifest(alice, 'myapp', 'latest')).digest).toBe(computeDigest(v2));

    await registry.deleteManifest(alice, 'myapp', 'v2');
    expect((await registry.listTags(alice, 'myapp')).items).toEqual(['latest']);
  });

  test('should show a repository created by a write in the next catalog read', async () => {
    const { registry } = setup();
    expect((await registry.getCatalog(alice)).items).toEqual([]);

    await registry.startUpload(alice, 'fresh');
    expect((await registry.getCatalog(alice)).items).toEqual(['fresh']);
  });

  test('should not serve a deleted manifest from the cache', async () => {
    const { registry } = setup();
    const digest = computeDigest(v1);
    await registry.putManifest(alice, 'myapp', 'latest', v1, MediaTypes.OCI_MANIFEST);
    await registry.getManifest(alice, 'myapp', digest);

    await registry.deleteManifest(alice, 'myapp', digest);
    await expect(registry.getManifest(alice, 'myapp', digest)).rejects.toMatchObject({ code: 'MANIFEST_UNKNOWN' });
    await expect(registry.getManifest(alice, 'myapp', 'latest')).rejects.toMatchObject({ code: 'MANIFEST_UNKNOWN' });
  });

  test('should drop the cached bytes of a manifest orphaned by a tag repoint', async () => {
    const { registry, cache } = setup();
    await registry.putManifest(alice, 'myapp', 'latest', v1, MediaTypes.OCI_MANIFEST);
    await registry.getManifest(alice, 'myapp', computeDigest(v1));
    expect(cache.stats().memory_cache.manifest_count).toBe(1);

    const result = await registry.putManifest(alice, 'myapp', 'latest', v2, MediaTypes.OCI_MANIFEST);
    expect(result.removedDigests).toEqual([computeDigest(v1)]);
    expect(cache.stats().memory_cache.manifest_count).toBe(0);
    await expect(registry.getManifest(alice, 'myapp', computeDigest(v1))).rejects.toMatchObject({
      code: 'MANIFEST_UNKNOWN',
    });
  });

  test('should not leak a manifest into a repository that lacks it', async () => {
    const { registry } = setup();
    await registry.putManifest(alice, 'one', 'latest', v1, MediaTypes.OCI_MANIFEST);
    await registry.createRepository(alice, 'two');
    await registry.getManifest(alice, 'one', computeDigest(v1));

    await expect(registry.getManifest(alice, 'two', computeDigest(v1))).rejects.toMatchObject({
      code: 'MANIFEST_UNKNOWN',
    });
  });

  test('should filter the catalog by read permission', async () => {
    const { registry } = setup({
      access: {
        enabled: true,
        defaultPolicy: 'deny',
        adminUsers: ['root'],
        rules: [
          { repository: 'public/*', users: ['*'], capabilities: ['read'] },
          { repository: 'team/*', users: ['alice'], capabilities: ['read', 'write'] },
        ],
      },
    });
    const admin = { username: 'root' };
    for (const name of ['public/base', 'team/api', 'secret']) {
      await registry.createRepository(admin, name);
    }

    expect((await registry.getCatalog(admin)).items).toEqual(['public/base', 'secret', 'team/api']);
    expect((await registry.getCatalog(alice)).items).toEqual(['public/base', 'team/api']);
    expect((await registry.getCatalog(ANONYMOUS)).items).toEqual(['public/base']);
    expect((await registry.listRepositories(alice)).map((summary) => summary.name)).toEqual([
      'public/base',
      'team/api',
    ]);

    await expect(registry.startUpload(ANONYMOUS, 'team/api')).rejects.toThrow(UnauthorizedError);
    await expect(registry.startUpload({ username: 'bob' }, 'team/api')).rejects.toThrow(DeniedError);
    await expect(registry.listTags(alice, 'secret')).rejects.toThrow(DeniedError);
  });

  test('should paginate the catalog after filtering', async () => {
    const { registry } = setup();
    for (const name of ['a', 'b', 'c']) {
      await registry.createRepository(alice, name);
    }
    expect(await registry.getCatalog(alice, { limit: 2 })).toEqual({ items: ['a', 'b'], hasMore: true });
    expect(await registry.getCatalog(alice, { limit: 2, last: 'b' })).toEqual({ items: ['c'], hasMore: false });
  });

  test('should not let a session be driven through another repository', async () => {
    const { registry } = setup();
    const session = await registry.startUpload(alice, 'one');
    await registry.createRepository(alice, 'two');
    await expect(registry.appendChunk(alice, 'two', session.id, Buffer.from('x'))).rejects.toThrow(
      SessionNotFoundError
    );
  });

  test('should serve blobs only through repositories that link them', async () => {
    const { registry } = setup();
    const content = Buffer.from('layer');
    const digest = computeDigest(content);
    await registry.uploadMonolithic(alice, 'one', content, digest);
    await registry.createRepository(alice, 'two');

    expect((await registry.statBlob(alice, 'one', digest)).size).toBe(5);
    await expect(registry.statBlob(alice, 'two', digest)).rejects.toMatchObject({ code: 'BLOB_UNKNOWN' });
    await expect(registry.statBlob(alice, 'one', 'sha256:short')).rejects.toMatchObject({ code: 'DIGEST_INVALID' });
  });

  test('should cancel open uploads when a repository is deleted', async () => {
    const { registry } = setup();
    const session = await registry.startUpload(alice, 'gone');
    await registry.deleteRepository(alice, 'gone');

    await expect(registry.uploads.status(session.id)).rejects.toThrow(SessionNotFoundError);
    expect((await registry.getCatalog(alice)).items).toEqual([]);
  });

  test('should report degraded health when the shared cache is unreachable', async () => {
    const shared = new FakeSharedCache();
    const { registry } = setup({}, shared);
    expect(await registry.checkHealth()).toEqual({
      status: 'healthy',
      storage: 'ok',
      cache: { memory: 'ok', redis: 'connected' },
    });

    shared.failing = true;
    expect((await registry.checkHealth()).status).toBe('degraded');
    await registry.putManifest(alice, 'myapp', 'latest', v1, MediaTypes.OCI_MANIFEST);
    expect((await registry.getManifest(alice, 'myapp', 'latest')).content.equals(v1)).toBe(true);
  });
});
