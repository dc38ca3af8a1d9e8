/**
 * Unit tests for the content stores
 */

import * as fs from 'fs';
import * as path from 'path';
import { computeDigest } from './digest';
import { FilesystemContentStore, MemoryContentStore } from './storage';
import { tempRoot } from '../../test-utils';

describe('FilesystemContentStore', () => {
  let store: FilesystemContentStore;
  let testRoot: string;

  beforeAll(() => {
    testRoot = tempRoot('content-store');
    store = new FilesystemContentStore(testRoot);
  });

  afterAll(() => {
    fs.rmSync(testRoot, { recursive: true, force: true });
  });

  describe('initialization', () => {
    test('should initialize storage directory structure', () => {
      expect(fs.existsSync(path.join(testRoot, 'blobs', 'sha256'))).toBe(true);
      expect(fs.existsSync(path.join(testRoot, 'blobs', 'sha512'))).toBe(true);
      expect(fs.existsSync(path.join(testRoot, 'tmp'))).toBe(true);
    });
  });

  describe('blob operations', () => {
    test('should store and retrieve content under a sharded path', async () => {
      const content = Buffer.from('test blob content for sha256');
      const digest = computeDigest(content);
      await store.put(digest, content);

      const hex = digest.slice('sha256:'.length);
      expect(fs.existsSync(path.join(testRoot, 'blobs', 'sha256', hex.slice(0, 2), hex.slice(2)))).toBe(true);
      expect((await store.get(digest))?.toString()).toBe('test blob content for sha256');
      expect(await store.size(digest)).toBe(content.length);
      expect(await store.exists(digest)).toBe(true);
    });

    test('should store sha512 content', async () => {
      const content = Buffer.from('sha512 test content');
      const digest = computeDigest(content, 'sha512');
      await store.put(digest, content);
      expect((await store.get(digest))?.toString()).toBe('sha512 test content');
    });

    test('should report absent content as null or false', async () => {
      const digest = computeDigest('never stored');
      expect(await store.get(digest)).toBeNull();
      expect(await store.size(digest)).toBeNull();
      expect(await store.exists(digest)).toBe(false);
      expect(await store.delete(digest)).toBe(false);
    });

    test('should delete content', async () => {
      const content = Buffer.from('to be deleted');
      const digest = computeDigest(content);
      await store.put(digest, content);
      expect(await store.delete(digest)).toBe(true);
      expect(await store.exists(digest)).toBe(false);
    });

    test('should leave no temp files behind', () => {
      expect(fs.readdirSync(path.join(testRoot, 'tmp'))).toEqual([]);
    });

    test('should pass the health check', async () => {
      await expect(store.healthCheck()).resolves.toBeUndefined();
    });
  });
});

describe('MemoryContentStore', () => {
  test('should return copies, not the stored buffer', async () => {
    const store = new MemoryContentStore();
    const content = Buffer.from('abc');
    const digest = computeDigest(content);
    await store.put(digest, content);

    const first = await store.get(digest);
    first?.fill(0);
    expect((await store.get(digest))?.toString()).toBe('abc');
    expect(store.count).toBe(1);
    expect(await store.delete(digest)).toBe(true);
    expect(store.count).toBe(0);
  });
});
