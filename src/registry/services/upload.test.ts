/**
 * Unit tests for BlobUploadManager
 */

import * as fs from 'fs';
import * as path from 'path';
import { SqliteDB } from '../../db/database';
import { RepositoriesRepository } from '../../db/repository';
import { tempRoot } from '../../test-utils';
import {
  DigestMismatchError,
  OffsetMismatchError,
  RepositoryInvalidError,
  SessionExpiredError,
  SessionNotFoundError,
  StoreUnavailableError,
} from '../errors';
import { BlobService } from './blobs';
import { computeDigest } from './digest';
import { KeyedLock } from './lock';
import { MemoryContentStore } from './storage';
import { BlobUploadManager } from './upload';

describe('BlobUploadManager', () => {
  let db: SqliteDB;
  let store: MemoryContentStore;
  let blobs: BlobService;
  let uploads: BlobUploadManager;
  let spoolRoot: string;
  let clock: Date;

  beforeEach(() => {
    db = new SqliteDB(':memory:');
    new RepositoriesRepository(db).create('myapp');
    store = new MemoryContentStore();
    const lock = new KeyedLock();
    blobs = new BlobService(db, store, lock);
    spoolRoot = path.join(tempRoot('uploads'), 'uploads');
    clock = new Date('2024-01-01T00:00:00.000Z');
    uploads = new BlobUploadManager({ db, blobs, lock, spoolRoot, ttlSeconds: 3600, now: () => clock });
  });

  afterEach(() => {
    db.close();
    fs.rmSync(path.dirname(spoolRoot), { recursive: true, force: true });
  });

  test('should start a session at offset 0 with a spool file', async () => {
    const session = await uploads.start('myapp');
    expect(session.offset).toBe(0);
    expect(session.repository).toBe('myapp');
    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(fs.statSync(path.join(spoolRoot, session.id, 'data')).size).toBe(0);
  });

  test('should reject an invalid repository name', async () => {
    await expect(uploads.start('MyApp')).rejects.toThrow(RepositoryInvalidError);
  });

  test('should assemble two 1024-byte chunks and commit the blob', async () => {
    const first = Buffer.alloc(1024, 1);
    const second = Buffer.alloc(1024, 2);
    const digest = computeDigest(Buffer.concat([first, second]));

    const session = await uploads.start('myapp');
    expect(await uploads.appendChunk(session.id, first, 0)).toBe(1024);
    expect(await uploads.appendChunk(session.id, second, 1024)).toBe(2048);

    const blob = await uploads.complete(session.id, Buffer.alloc(0), digest);
    expect(blob).toMatchObject({ digest, size: 2048, mediaType: 'application/octet-stream' });
    expect(await store.size(digest)).toBe(2048);
    expect(fs.existsSync(path.join(spoolRoot, session.id))).toBe(false);
    await expect(uploads.status(session.id)).rejects.toThrow(SessionNotFoundError);
  });

  test('should reject a chunk at the wrong offset without changing the session', async () => {
    const session = await uploads.start('myapp');
    await uploads.appendChunk(session.id, Buffer.alloc(10), 0);

    const attempt = uploads.appendChunk(session.id, Buffer.alloc(10), 5);
    await expect(attempt).rejects.toThrow(OffsetMismatchError);
    await expect(uploads.appendChunk(session.id, Buffer.alloc(10), 5)).rejects.toMatchObject({
      statusCode: 416,
      currentOffset: 10,
    });
    expect((await uploads.status(session.id)).offset).toBe(10);
  });

  test('should stay resumable after an append fails part way through', async () => {
    const chunk = Buffer.alloc(1024, 7);
    const session = await uploads.start('myapp');
    jest.spyOn(fs.promises, 'appendFile').mockImplementationOnce(async (file) => {
      await fs.promises.writeFile(file, chunk.subarray(0, 100), { flag: 'a' });
      throw new Error('ENOSPC: no space left on device');
    });

    await expect(uploads.appendChunk(session.id, chunk, 0)).rejects.toThrow(StoreUnavailableError);
    expect((await uploads.status(session.id)).offset).toBe(0);

    expect(await uploads.appendChunk(session.id, chunk, 0)).toBe(1024);
    const blob = await uploads.complete(session.id, Buffer.alloc(0), computeDigest(chunk));
    expect(blob).toMatchObject({ digest: computeDigest(chunk), size: 1024 });
  });

  test('should append at the current offset when no start offset is given', async () => {
    const session = await uploads.start('myapp');
    await uploads.appendChunk(session.id, Buffer.from('abc'));
    expect(await uploads.appendChunk(session.id, Buffer.from('def'))).toBe(6);
  });

  test('should include the final chunk supplied at completion', async () => {
    const session = await uploads.start('myapp');
    await uploads.appendChunk(session.id, Buffer.from('hello '), 0);
    const blob = await uploads.complete(session.id, Buffer.from('world'), computeDigest('hello world'));
    expect((await store.get(blob.digest))?.toString()).toBe('hello world');
  });

  test('should discard the session and write nothing on digest mismatch', async () => {
    const session = await uploads.start('myapp');
    await uploads.appendChunk(session.id, Buffer.from('actual bytes'), 0);

    const wrong = computeDigest('other bytes');
    await expect(uploads.complete(session.id, Buffer.alloc(0), wrong)).rejects.toThrow(DigestMismatchError);
    expect(store.count).toBe(0);
    await expect(uploads.status(session.id)).rejects.toThrow(SessionNotFoundError);
  });

  test('should deduplicate identical content', async () => {
    const content = Buffer.from('shared layer');
    const digest = computeDigest(content);
    const putSpy = jest.spyOn(store, 'put');

    await uploads.upload('myapp', content, digest);
    const session = await uploads.start('myapp');
    await uploads.complete(session.id, content, digest);

    expect(putSpy).toHaveBeenCalledTimes(1);
    expect(store.count).toBe(1);
  });

  test('should verify monolithic uploads', async () => {
    await expect(uploads.upload('myapp', Buffer.from('x'), computeDigest('y'))).rejects.toThrow(DigestMismatchError);
    const blob = await uploads.upload('myapp', Buffer.from('x'), computeDigest('x'));
    expect(blob.size).toBe(1);
  });

  test('should make cancel idempotent', async () => {
    const session = await uploads.start('myapp');
    await uploads.cancel(session.id);
    await uploads.cancel(session.id);
    await expect(uploads.appendChunk(session.id, Buffer.from('late'))).rejects.toThrow(SessionNotFoundError);
  });

  test('should report an unknown id as not found', async () => {
    await expect(uploads.status('not-a-uuid')).rejects.toMatchObject({ code: 'BLOB_UPLOAD_UNKNOWN', statusCode: 404 });
  });

  test('should expire sessions idle past the TTL', async () => {
    const session = await uploads.start('myapp');
    clock = new Date('2024-01-01T01:00:00.000Z');
    await expect(uploads.appendChunk(session.id, Buffer.from('late'))).rejects.toThrow(SessionExpiredError);
    await expect(uploads.status(session.id)).rejects.toThrow(SessionNotFoundError);
  });

  test('should reclaim expired sessions in bulk', async () => {
    const stale = await uploads.start('myapp');
    clock = new Date('2024-01-01T00:30:00.000Z');
    const fresh = await uploads.start('myapp');

    expect(await uploads.reclaimExpired(new Date('2024-01-01T01:10:00.000Z'))).toBe(1);
    expect((await uploads.status(fresh.id)).id).toBe(fresh.id);
    await expect(uploads.status(stale.id)).rejects.toThrow(SessionNotFoundError);
    expect(fs.existsSync(path.join(spoolRoot, stale.id))).toBe(false);
  });

  test('should serialize concurrent chunks on one session', async () => {
    const session = await uploads.start('myapp');
    const results = await Promise.allSettled([
      uploads.appendChunk(session.id, Buffer.alloc(4), 0),
      uploads.appendChunk(session.id, Buffer.alloc(4), 0),
    ]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect((await uploads.status(session.id)).offset).toBe(4);
  });
});
