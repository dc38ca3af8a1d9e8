/**
 * Shared fixtures for the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RegistryConfig } from './config';
import { SqliteDB } from './db/database';
import { RegistryCache, SharedCache } from './registry/services/cache';
import { computeDigest } from './registry/services/digest';
import { RegistryService } from './registry/services/registry';
import { MemoryContentStore } from './registry/services/storage';
import { MediaTypes } from './registry/types/manifest';

export function tempRoot(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `test-${prefix}-`));
}

export function testConfig(root: string, overrides: Partial<RegistryConfig> = {}): RegistryConfig {
  return {
    server: { host: '127.0.0.1', port: 0, maxBodySize: '10mb' },
    storage: { root, dbPath: ':memory:', uploadTtl: 3600, cleanupInterval: 300 },
    validation: { repositoryNameMaxLength: 255, tagMaxLength: 128 },
    policy: { autoCreateRepositories: true, strictManifestValidation: false },
    pagination: { defaultLimit: 100, maxLimit: 1000 },
    cache: { manifestTtl: 300, tagTtl: 120, catalogTtl: 60, maxEntries: 10000, sharedTtl: 30 },
    access: { enabled: false, defaultPolicy: 'allow', adminUsers: [], rules: [] },
    apiKeys: {},
    ...overrides,
  };
}

export interface TestRegistry {
  registry: RegistryService;
  db: SqliteDB;
  store: MemoryContentStore;
  cache: RegistryCache;
}

export function createTestRegistry(config: RegistryConfig, shared?: SharedCache): TestRegistry {
  const db = new SqliteDB(':memory:');
  const store = new MemoryContentStore();
  const cache = new RegistryCache(config.cache, shared);
  const registry = new RegistryService({ config, db, store, cache });
  return { registry, db, store, cache };
}

/**
 * OCI image manifest bytes referencing the given blobs.
 */
export function imageManifest(config: Buffer, layers: Buffer[], annotation?: string): Buffer {
  const manifest = {
    schemaVersion: 2,
    mediaType: MediaTypes.OCI_MANIFEST,
    config: {
      mediaType: 'application/vnd.oci.image.config.v1+json',
      digest: computeDigest(config),
      size: config.length,
    },
    layers: layers.map((layer) => ({
      mediaType: 'application/vnd.oci.image.layer.v1.tar+gzip',
      digest: computeDigest(layer),
      size: layer.length,
    })),
    ...(annotation !== undefined && { annotations: { 'org.example.note': annotation } }),
  };
  return Buffer.from(JSON.stringify(manifest));
}

/**
 * In-process stand-in for the Redis tier. Set `failing` to make every call reject.
 */
export class FakeSharedCache implements SharedCache {
  entries: Map<string, { value: string; ttlSeconds: number }> = new Map();
  failing = false;
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.entries.get(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.entries.set(key, { value, ttlSeconds });
  }

  async del(keys: string[]): Promise<void> {
    this.check();
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  async delByPrefix(prefix: string): Promise<number> {
    this.check();
    let deleted = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    this.check();
    return true;
  }

  isConnected(): boolean {
    return !this.failing;
  }

  async quit(): Promise<void> {
    this.quitCalled = true;
  }

  private check(): void {
    if (this.failing) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
  }
}
