/**
 * Unit tests for the metadata repositories
 */

import { SqliteDB } from './database';
import {
  BlobRepository,
  ManifestRepository,
  RepositoriesRepository,
  TagRepository,
  UploadRepository,
} from './repository';

const DIGEST_A = 'sha256:' + 'a'.repeat(64);
const DIGEST_B = 'sha256:' + 'b'.repeat(64);

describe('metadata repositories', () => {
  let db: SqliteDB;
  let repositories: RepositoriesRepository;
  let blobs: BlobRepository;
  let manifests: ManifestRepository;
  let tags: TagRepository;

  beforeEach(() => {
    db = new SqliteDB(':memory:');
    repositories = new RepositoriesRepository(db);
    blobs = new BlobRepository(db);
    manifests = new ManifestRepository(db);
    tags = new TagRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('RepositoriesRepository', () => {
    test('should create once and list in byte order', () => {
      expect(repositories.create('zeta')).toBe(true);
      expect(repositories.create('alpha/web')).toBe(true);
      expect(repositories.create('alpha')).toBe(true);
      expect(repositories.create('alpha')).toBe(false);

      expect(repositories.listNames()).toEqual(['alpha', 'alpha/web', 'zeta']);
      expect(repositories.listNames(2)).toEqual(['alpha', 'alpha/web']);
      expect(repositories.listNames(10, 'alpha/web')).toEqual(['zeta']);
    });

    test('should summarize tag and manifest counts', () => {
      repositories.create('app');
      manifests.insert({ repository: 'app', digest: DIGEST_A, mediaType: 'm', size: 1 });
      tags.upsert('app', 'v1', DIGEST_A);
      tags.upsert('app', 'v2', DIGEST_A);

      const [summary] = repositories.listSummaries();
      expect(summary).toMatchObject({ name: 'app', tagCount: 2, manifestCount: 1 });
    });

    test('should cascade a repository delete to manifests and tags', () => {
      repositories.create('app');
      manifests.insert({ repository: 'app', digest: DIGEST_A, mediaType: 'm', size: 1 });
      tags.upsert('app', 'latest', DIGEST_A);

      expect(repositories.delete('app')).toBe(true);
      expect(manifests.countReferences(DIGEST_A)).toBe(0);
      expect(tags.get('app', 'latest')).toBeUndefined();
    });
  });

  describe('BlobRepository', () => {
    test('should record a blob once and link it per repository', () => {
      repositories.create('one');
      repositories.create('two');
      blobs.record('one', { digest: DIGEST_A, size: 3, mediaType: 'application/octet-stream' });
      blobs.record('two', { digest: DIGEST_A, size: 3, mediaType: 'application/octet-stream' });

      expect(blobs.isLinked('one', DIGEST_A)).toBe(true);
      expect(blobs.isLinked('two', DIGEST_A)).toBe(true);

      expect(blobs.unlink('one', DIGEST_A)).toBe(false);
      expect(blobs.get(DIGEST_A)?.size).toBe(3);
      expect(blobs.unlink('two', DIGEST_A)).toBe(true);
      expect(blobs.get(DIGEST_A)).toBeUndefined();
    });

    test('should prune blobs orphaned by a repository delete', () => {
      repositories.create('gone');
      blobs.record('gone', { digest: DIGEST_B, size: 1, mediaType: 'application/octet-stream' });
      repositories.delete('gone');

      expect(blobs.pruneUnlinked()).toEqual([DIGEST_B]);
      expect(blobs.get(DIGEST_B)).toBeUndefined();
    });
  });

  describe('TagRepository', () => {
    beforeEach(() => {
      repositories.create('app');
      manifests.insert({ repository: 'app', digest: DIGEST_A, mediaType: 'm', size: 1 });
      manifests.insert({ repository: 'app', digest: DIGEST_B, mediaType: 'm', size: 1 });
    });

    test('should report the previous digest when repointing', () => {
      expect(tags.upsert('app', 'latest', DIGEST_A)).toBeUndefined();
      expect(tags.upsert('app', 'latest', DIGEST_B)).toBe(DIGEST_A);
      expect(tags.get('app', 'latest')?.digest).toBe(DIGEST_B);
      expect(tags.countForDigest('app', DIGEST_A)).toBe(0);
    });

    test('should refuse a tag pointing at a manifest the repository lacks', () => {
      expect(() => tags.upsert('app', 'latest', 'sha256:' + 'c'.repeat(64))).toThrow();
    });

    test('should list tags lexicographically', () => {
      tags.upsert('app', 'v2', DIGEST_A);
      tags.upsert('app', 'latest', DIGEST_A);
      tags.upsert('app', 'v10', DIGEST_B);
      expect(tags.listNames('app')).toEqual(['latest', 'v10', 'v2']);
      expect(tags.listByDigest('app', DIGEST_A)).toEqual(['latest', 'v2']);
    });
  });

  describe('UploadRepository', () => {
    test('should track offset and idle expiry', () => {
      repositories.create('app');
      const uploads = new UploadRepository(db, 60_000);
      const t0 = new Date('2024-01-01T00:00:00.000Z');
      const session = uploads.create('id-1', 'app', t0);

      expect(session.offset).toBe(0);
      expect(session.expiresAt.toISOString()).toBe('2024-01-01T00:01:00.000Z');

      uploads.updateOffset('id-1', 1024, new Date('2024-01-01T00:00:30.000Z'));
      expect(uploads.getById('id-1')?.offset).toBe(1024);
      expect(uploads.listExpired(new Date('2024-01-01T00:01:20.000Z'))).toEqual([]);
      expect(uploads.listExpired(new Date('2024-01-01T00:01:31.000Z')).map((s) => s.id)).toEqual(['id-1']);

      expect(uploads.delete('id-1')).toBe(true);
      expect(uploads.getById('id-1')).toBeUndefined();
    });
  });
});
