/**
 * Registry cache
 *
 * Read-through cache for catalog listings, tag listings, tag resolutions and manifest
 * bytes. An in-process tier always runs; an optional shared tier (Redis) lets several
 * registry processes share hot entries. Shared-tier failures are logged and the cache
 * keeps serving from memory.
 */

import Redis from 'ioredis';
import { z } from 'zod';
import { CacheConfig } from '../../config';
import { createLogger } from '../../logger';
import { StoredManifest } from '../types/registry';

const logger = createLogger('cache');

export type CacheValue =
  | { type: 'manifest'; manifest: StoredManifest }
  | { type: 'digest'; digest: string }
  | { type: 'tags'; tags: string[] }
  | { type: 'catalog'; repositories: string[] };

export type CacheValueType = CacheValue['type'];

export type CacheValueOf<T extends CacheValueType> = Extract<CacheValue, { type: T }>;

function isCacheValue<T extends CacheValueType>(value: CacheValue, type: T): value is CacheValueOf<T> {
  return value.type === type;
}

export const CacheKeys = {
  catalog: (): string => 'catalog',
  tags: (repository: string): string => `tags:${repository}`,
  manifest: (digest: string): string => `manifest:${digest}`,
  manifestTag: (repository: string, tag: string): string => `manifest-tag:${repository}:${tag}`,
  manifestTagPrefix: (repository: string): string => `manifest-tag:${repository}:`,
};

interface MemoryEntry {
  value: CacheValue;
  insertedAt: number;
  expiresAt: number;
}

const wireSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('manifest'),
    manifest: z.object({
      digest: z.string(),
      mediaType: z.string(),
      size: z.number(),
      content: z.string(),
    }),
  }),
  z.object({ type: z.literal('digest'), digest: z.string() }),
  z.object({ type: z.literal('tags'), tags: z.array(z.string()) }),
  z.object({ type: z.literal('catalog'), repositories: z.array(z.string()) }),
]);

/**
 * Shared-tier serialization. Manifest bytes travel as base64.
 */
export function encodeCacheValue(value: CacheValue): string {
  if (value.type === 'manifest') {
    return JSON.stringify({
      type: 'manifest',
      manifest: { ...value.manifest, content: value.manifest.content.toString('base64') },
    });
  }
  return JSON.stringify(value);
}

export function decodeCacheValue(raw: string): CacheValue | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = wireSchema.safeParse(json);
  if (!parsed.success) return undefined;

  const data = parsed.data;
  if (data.type === 'manifest') {
    return {
      type: 'manifest',
      manifest: { ...data.manifest, content: Buffer.from(data.manifest.content, 'base64') },
    };
  }
  return data;
}

/**
 * In-process tier: per-entry expiry and a cap on the number of entries.
 */
export class MemoryCache {
  private entries: Map<string, MemoryEntry> = new Map();

  constructor(private maxEntries: number) {}

  get(key: string, now: number): CacheValue | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: CacheValue, ttlMs: number, now: number): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.evict(now);
    }
    this.entries.set(key, { value, insertedAt: now, expiresAt: now + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteByPrefix(prefix: string): number {
    let deleted = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  countByType(): Record<CacheValueType, number> {
    const counts: Record<CacheValueType, number> = { manifest: 0, digest: 0, tags: 0, catalog: 0 };
    for (const entry of this.entries.values()) {
      counts[entry.value.type]++;
    }
    return counts;
  }

  /**
   * Drop expired entries first, then the oldest until there is room for one more.
   */
  private evict(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
    for (const key of this.entries.keys()) {
      if (this.entries.size < this.maxEntries) break;
      this.entries.delete(key);
    }
  }
}

/**
 * Shared tier contract. Keys are passed without the tier's own prefix.
 */
export interface SharedCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<void>;
  delByPrefix(prefix: string): Promise<number>;
  ping(): Promise<boolean>;
  isConnected(): boolean;
  quit(): Promise<void>;
}

export class RedisSharedCache implements SharedCache {
  private client: Redis;

  constructor(
    url: string,
    private keyPrefix: string = 'registry:cache:'
  ) {
    this.client = new Redis(url, {
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      retryStrategy: (times: number) => Math.min(times * 200, 5000),
    });

    this.client.on('error', (error: Error) => {
      logger.warn({ err: error.message }, 'Redis connection error, serving from memory');
    });
    this.client.on('ready', () => {
      logger.info('Redis shared cache connected');
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(this.keyPrefix + key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setex(this.keyPrefix + key, ttlSeconds, value);
  }

  async del(keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    await this.client.del(...keys.map((key) => this.keyPrefix + key));
  }

  async delByPrefix(prefix: string): Promise<number> {
    const stream = this.client.scanStream({ match: `${this.keyPrefix}${prefix}*`, count: 100 });
    let deleted = 0;
    for await (const batch of stream) {
      const keys: unknown = batch;
      if (!Array.isArray(keys)) continue;
      const names = keys.filter((key): key is string => typeof key === 'string');
      if (names.length > 0) {
        deleted += await this.client.del(...names);
      }
    }
    return deleted;
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === 'PONG';
  }

  isConnected(): boolean {
    return this.client.status === 'ready';
  }

  async quit(): Promise<void> {
    if (this.client.status === 'end') return;
    await this.client.quit();
  }
}

export interface CacheStats {
  memory_cache: {
    total_entries: number;
    max_entries: number;
    manifest_count: number;
    tag_resolution_count: number;
    tag_list_count: number;
    catalog_count: number;
    hits: number;
    misses: number;
  };
  redis_enabled: boolean;
  redis_connected: boolean;
}

export interface CacheHealth {
  memory: 'ok';
  redis: 'connected' | 'unreachable' | 'disabled';
}

export class RegistryCache {
  private memory: MemoryCache;
  private shared?: SharedCache;
  private config: CacheConfig;
  private now: () => number;
  private hits = 0;
  private misses = 0;
  // bumped by every invalidation
  private epoch = 0;

  constructor(config: CacheConfig, shared?: SharedCache, now: () => number = Date.now) {
    this.config = config;
    this.memory = new MemoryCache(config.maxEntries);
    this.shared = shared;
    this.now = now;
  }

  async get(key: string): Promise<CacheValue | undefined> {
    return this.lookup(key, this.epoch);
  }

  async set(key: string, value: CacheValue): Promise<void> {
    await this.store(key, value, this.epoch);
  }

  async getOrLoad<T extends CacheValueType>(
    key: string,
    type: T,
    loader: () => Promise<CacheValueOf<T>>
  ): Promise<CacheValueOf<T>> {
    const epoch = this.epoch;
    const cached = await this.lookup(key, epoch);
    if (cached && isCacheValue(cached, type)) return cached;
    const value = await loader();
    await this.store(key, value, epoch);
    return value;
  }

  async manifest(digest: string, loader: () => Promise<StoredManifest>): Promise<StoredManifest> {
    const value = await this.getOrLoad<'manifest'>(CacheKeys.manifest(digest), 'manifest', async () => ({
      type: 'manifest',
      manifest: await loader(),
    }));
    return value.manifest;
  }

  async tagDigest(repository: string, tag: string, loader: () => Promise<string>): Promise<string> {
    const key = CacheKeys.manifestTag(repository, tag);
    const value = await this.getOrLoad<'digest'>(key, 'digest', async () => ({
      type: 'digest',
      digest: await loader(),
    }));
    return value.digest;
  }

  async tags(repository: string, loader: () => Promise<string[]>): Promise<string[]> {
    const value = await this.getOrLoad<'tags'>(CacheKeys.tags(repository), 'tags', async () => ({
      type: 'tags',
      tags: await loader(),
    }));
    return value.tags;
  }

  async catalog(loader: () => Promise<string[]>): Promise<string[]> {
    const value = await this.getOrLoad<'catalog'>(CacheKeys.catalog(), 'catalog', async () => ({
      type: 'catalog',
      repositories: await loader(),
    }));
    return value.repositories;
  }

  /**
   * Drop every entry derived from a repository's tags, plus the catalog.
   */
  async invalidate(repository: string): Promise<void> {
    this.epoch++;
    const keys = [CacheKeys.catalog(), CacheKeys.tags(repository)];
    const prefix = CacheKeys.manifestTagPrefix(repository);
    for (const key of keys) {
      this.memory.delete(key);
    }
    this.memory.deleteByPrefix(prefix);

    if (!this.shared) return;
    try {
      await this.shared.del(keys);
      await this.shared.delByPrefix(prefix);
    } catch (error) {
      logger.warn({ repository, err: errorMessage(error) }, 'Shared cache invalidation failed');
    }
  }

  async invalidateManifest(digest: string): Promise<void> {
    this.epoch++;
    const key = CacheKeys.manifest(digest);
    this.memory.delete(key);
    if (!this.shared) return;
    try {
      await this.shared.del([key]);
    } catch (error) {
      logger.warn({ digest, err: errorMessage(error) }, 'Shared cache invalidation failed');
    }
  }

  async clear(): Promise<void> {
    this.epoch++;
    this.memory.clear();
    this.hits = 0;
    this.misses = 0;
    if (!this.shared) return;
    try {
      await this.shared.delByPrefix('');
    } catch (error) {
      logger.warn({ err: errorMessage(error) }, 'Shared cache clear failed');
    }
  }

  stats(): CacheStats {
    const counts = this.memory.countByType();
    return {
      memory_cache: {
        total_entries: this.memory.size,
        max_entries: this.config.maxEntries,
        manifest_count: counts.manifest,
        tag_resolution_count: counts.digest,
        tag_list_count: counts.tags,
        catalog_count: counts.catalog,
        hits: this.hits,
        misses: this.misses,
      },
      redis_enabled: this.shared !== undefined,
      redis_connected: this.shared?.isConnected() ?? false,
    };
  }

  async healthCheck(): Promise<CacheHealth> {
    if (!this.shared) {
      return { memory: 'ok', redis: 'disabled' };
    }
    try {
      return { memory: 'ok', redis: (await this.shared.ping()) ? 'connected' : 'unreachable' };
    } catch (error) {
      logger.warn({ err: errorMessage(error) }, 'Shared cache health check failed');
      return { memory: 'ok', redis: 'unreachable' };
    }
  }

  async close(): Promise<void> {
    this.memory.clear();
    if (!this.shared) return;
    try {
      await this.shared.quit();
    } catch (error) {
      logger.warn({ err: errorMessage(error) }, 'Shared cache close failed');
    }
  }

  /**
   * Reads and writes carry the epoch seen when the operation began. A shared-tier
   * value read across an invalidation is returned but not copied into memory, and a
   * shared-tier write that an invalidation overtook is deleted again.
   */
  private async lookup(key: string, epoch: number): Promise<CacheValue | undefined> {
    const local = this.memory.get(key, this.now());
    if (local) {
      this.hits++;
      return local;
    }

    const remote = await this.sharedGet(key);
    if (remote) {
      this.hits++;
      if (epoch === this.epoch) {
        this.memory.set(key, remote, this.ttlMs(remote.type), this.now());
      }
      return remote;
    }

    this.misses++;
    return undefined;
  }

  private async store(key: string, value: CacheValue, epoch: number): Promise<void> {
    if (epoch !== this.epoch) {
      logger.debug({ key }, 'Skipping cache fill raced by invalidation');
      return;
    }
    this.memory.set(key, value, this.ttlMs(value.type), this.now());
    if (!this.shared) return;
    try {
      await this.shared.set(key, encodeCacheValue(value), this.config.sharedTtl);
      if (epoch !== this.epoch) {
        await this.shared.del([key]);
      }
    } catch (error) {
      logger.warn({ key, err: errorMessage(error) }, 'Shared cache write failed');
    }
  }

  private async sharedGet(key: string): Promise<CacheValue | undefined> {
    if (!this.shared) return undefined;
    try {
      const raw = await this.shared.get(key);
      if (raw === null) return undefined;
      const value = decodeCacheValue(raw);
      if (!value) {
        logger.warn({ key }, 'Discarding undecodable shared cache entry');
      }
      return value;
    } catch (error) {
      logger.warn({ key, err: errorMessage(error) }, 'Shared cache read failed, using memory only');
      return undefined;
    }
  }

  private ttlMs(type: CacheValueType): number {
    switch (type) {
      case 'manifest':
      case 'digest':
        return this.config.manifestTtl * 1000;
      case 'tags':
        return this.config.tagTtl * 1000;
      case 'catalog':
        return this.config.catalogTtl * 1000;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createSharedCache(config: CacheConfig): SharedCache | undefined {
  return config.redisUrl ? new RedisSharedCache(config.redisUrl) : undefined;
}
