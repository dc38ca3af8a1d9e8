/**
 * RegistryService - Core registry operations
 *
 * Every write runs: authorize(write) -> ensureRepository -> operation -> cache invalidation,
 * and returns only after invalidation settles, so the next read observes the write.
 */

import * as path from 'path';
import { RegistryConfig } from '../../config';
import { SqliteDB } from '../../db/database';
import { createLogger } from '../../logger';
import { DigestMismatchError, NotFoundError, SessionNotFoundError } from '../errors';
import {
  BlobInfo,
  DeleteManifestResult,
  Page,
  PageRequest,
  PutManifestResult,
  RepositorySummary,
  StoredManifest,
  Subject,
  UploadSession,
} from '../types/registry';
import { paginate } from '../utils/pagination';
import { NamePolicy } from '../utils/validation';
import { AccessController } from './access';
import { BlobService } from './blobs';
import { CacheHealth, CacheStats, RegistryCache } from './cache';
import { isValidDigest } from './digest';
import { KeyedLock } from './lock';
import { ManifestStore, isDigestReference } from './manifests';
import { ContentStore } from './storage';
import { BlobUploadManager } from './upload';

const logger = createLogger('registry');

export interface RegistryServiceOptions {
  config: RegistryConfig;
  db: SqliteDB;
  store: ContentStore;
  cache: RegistryCache;
  access?: AccessController;
  now?: () => Date;
}

export interface RegistryHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  storage: 'ok' | 'unavailable';
  cache: CacheHealth;
}

export class RegistryService {
  readonly uploads: BlobUploadManager;
  readonly manifests: ManifestStore;
  readonly blobs: BlobService;
  private cache: RegistryCache;
  private store: ContentStore;
  private access: AccessController;

  constructor(options: RegistryServiceOptions) {
    const { config, db, store, cache } = options;
    const lock = new KeyedLock();
    const names = new NamePolicy(config.validation);

    this.store = store;
    this.cache = cache;
    this.access = options.access ?? new AccessController(config.access);
    this.blobs = new BlobService(db, store, lock);
    this.uploads = new BlobUploadManager({
      db,
      blobs: this.blobs,
      lock,
      spoolRoot: path.join(config.storage.root, 'uploads'),
      ttlSeconds: config.storage.uploadTtl,
      names,
      now: options.now,
    });
    this.manifests = new ManifestStore({
      db,
      store,
      blobs: this.blobs,
      lock,
      names,
      policy: config.policy,
    });
  }

  /**
   * Repositories the subject may read, in byte order.
   */
  async getCatalog(subject: Subject, page: PageRequest = {}): Promise<Page<string>> {
    const all = await this.cache.catalog(async () => this.manifests.listRepositories());
    const readable = all.filter((name) => this.access.isAllowed(subject, name, 'read'));
    return paginate(readable, page);
  }

  async listTags(subject: Subject, repository: string, page: PageRequest = {}): Promise<Page<string>> {
    this.access.authorize(subject, repository, 'read');
    if (!this.manifests.repositoryExists(repository)) {
      throw NotFoundError.repository(repository);
    }
    const tags = await this.cache.tags(repository, async () => this.manifests.listTags(repository));
    return paginate(tags, page);
  }

  async getManifest(subject: Subject, repository: string, reference: string): Promise<StoredManifest> {
    this.access.authorize(subject, repository, 'read');
    if (!this.manifests.repositoryExists(repository)) {
      throw NotFoundError.repository(repository);
    }

    const digest = isDigestReference(reference)
      ? reference
      : await this.cache.tagDigest(repository, reference, async () => this.manifests.resolveTag(repository, reference));
    if (!this.manifests.hasManifest(repository, digest)) {
      throw NotFoundError.manifest(repository, reference);
    }
    return this.cache.manifest(digest, () => this.manifests.loadManifest(repository, digest));
  }

  async statBlob(subject: Subject, repository: string, digest: string): Promise<BlobInfo> {
    this.access.authorize(subject, repository, 'read');
    this.assertDigest(digest);
    return this.blobs.stat(repository, digest);
  }

  async getBlob(subject: Subject, repository: string, digest: string): Promise<{ info: BlobInfo; content: Buffer }> {
    this.access.authorize(subject, repository, 'read');
    this.assertDigest(digest);
    return this.blobs.get(repository, digest);
  }

  async uploadStatus(subject: Subject, repository: string, id: string): Promise<UploadSession> {
    this.access.authorize(subject, repository, 'write');
    const session = await this.uploads.status(id);
    this.assertSessionRepository(session, repository);
    return session;
  }

  async startUpload(subject: Subject, repository: string): Promise<UploadSession> {
    await this.prepareWrite(subject, repository);
    return this.uploads.start(repository);
  }

  async appendChunk(
    subject: Subject,
    repository: string,
    id: string,
    chunk: Buffer,
    expectedStartOffset?: number
  ): Promise<number> {
    this.access.authorize(subject, repository, 'write');
    this.assertSessionRepository(await this.uploads.status(id), repository);
    return this.uploads.appendChunk(id, chunk, expectedStartOffset);
  }

  async completeUpload(
    subject: Subject,
    repository: string,
    id: string,
    finalChunk: Buffer,
    digest: string,
    mediaType?: string
  ): Promise<BlobInfo> {
    this.access.authorize(subject, repository, 'write');
    this.assertSessionRepository(await this.uploads.status(id), repository);
    return this.uploads.complete(id, finalChunk, digest, mediaType);
  }

  async cancelUpload(subject: Subject, repository: string, id: string): Promise<void> {
    this.access.authorize(subject, repository, 'write');
    this.assertSessionRepository(await this.uploads.status(id), repository);
    await this.uploads.cancel(id);
  }

  async uploadMonolithic(
    subject: Subject,
    repository: string,
    content: Buffer,
    digest: string,
    mediaType?: string
  ): Promise<BlobInfo> {
    await this.prepareWrite(subject, repository);
    return this.uploads.upload(repository, content, digest, mediaType);
  }

  async deleteBlob(subject: Subject, repository: string, digest: string): Promise<void> {
    this.access.authorize(subject, repository, 'write');
    this.assertDigest(digest);
    if (!this.manifests.repositoryExists(repository)) {
      throw NotFoundError.repository(repository);
    }
    await this.blobs.delete(repository, digest);
  }

  async putManifest(
    subject: Subject,
    repository: string,
    reference: string,
    content: Buffer,
    contentType?: string
  ): Promise<PutManifestResult> {
    await this.prepareWrite(subject, repository);
    const result = await this.manifests.putManifest(repository, reference, content, contentType);
    await this.invalidate(repository, result.removedDigests);
    return result;
  }

  async deleteManifest(subject: Subject, repository: string, reference: string): Promise<DeleteManifestResult> {
    this.access.authorize(subject, repository, 'write');
    const result = await this.manifests.deleteManifest(repository, reference);
    await this.invalidate(repository, result.removedDigests);
    return result;
  }

  async listRepositories(subject: Subject): Promise<RepositorySummary[]> {
    return this.manifests
      .listRepositorySummaries()
      .filter((summary) => this.access.isAllowed(subject, summary.name, 'read'));
  }

  async createRepository(subject: Subject, name: string): Promise<boolean> {
    this.access.authorize(subject, name, 'write');
    const created = this.manifests.createRepository(name);
    if (created) {
      await this.cache.invalidate(name);
    }
    return created;
  }

  async deleteRepository(subject: Subject, name: string): Promise<string[]> {
    this.access.authorize(subject, name, 'write');
    if (!this.manifests.repositoryExists(name)) {
      throw NotFoundError.repository(name);
    }
    await this.uploads.cancelRepository(name);
    const removed = await this.manifests.deleteRepository(name);
    await this.invalidate(name, removed);
    return removed;
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
    logger.info('Cache cleared');
  }

  /**
   * Check registry health
   */
  async checkHealth(): Promise<RegistryHealth> {
    let storage: RegistryHealth['storage'] = 'ok';
    try {
      await this.store.healthCheck();
    } catch (error) {
      logger.error({ err: error }, 'Content store health check failed');
      storage = 'unavailable';
    }
    const cache = await this.cache.healthCheck();

    let status: RegistryHealth['status'] = 'healthy';
    if (storage !== 'ok') {
      status = 'unhealthy';
    } else if (cache.redis === 'unreachable') {
      status = 'degraded';
    }
    return { status, storage, cache };
  }

  async close(): Promise<void> {
    await this.cache.close();
  }

  private async prepareWrite(subject: Subject, repository: string): Promise<void> {
    this.access.authorize(subject, repository, 'write');
    if (this.manifests.ensureRepository(repository)) {
      await this.cache.invalidate(repository);
    }
  }

  private async invalidate(repository: string, removedDigests: string[]): Promise<void> {
    await this.cache.invalidate(repository);
    for (const digest of removedDigests) {
      await this.cache.invalidateManifest(digest);
    }
  }

  private assertDigest(digest: string): void {
    if (!isValidDigest(digest)) {
      throw new DigestMismatchError(`invalid digest ${digest}`, { digest });
    }
  }

  private assertSessionRepository(session: UploadSession, repository: string): void {
    if (session.repository !== repository) {
      throw new SessionNotFoundError(session.id);
    }
  }
}
