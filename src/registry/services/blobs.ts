/**
 * Blob service - committed blob content and metadata, shared by uploads and manifests
 */

import { SqliteDB } from '../../db/database';
import { BlobRepository, ManifestRepository } from '../../db/repository';
import { createLogger } from '../../logger';
import { NotFoundError } from '../errors';
import { BlobInfo } from '../types/registry';
import { KeyedLock } from './lock';
import { ContentStore } from './storage';

const logger = createLogger('blobs');

export const DEFAULT_BLOB_MEDIA_TYPE = 'application/octet-stream';

export function digestLockKey(digest: string): string {
  return `digest:${digest}`;
}

export class BlobService {
  private blobs: BlobRepository;
  private manifests: ManifestRepository;

  constructor(
    db: SqliteDB,
    private store: ContentStore,
    private lock: KeyedLock
  ) {
    this.blobs = new BlobRepository(db);
    this.manifests = new ManifestRepository(db);
  }

  /**
   * Persist content whose digest the caller has already computed, then link it
   * to the repository. Content already present is not written again.
   */
  async commit(repository: string, digest: string, content: Buffer, mediaType?: string): Promise<BlobInfo> {
    return this.lock.run(digestLockKey(digest), async () => {
      if (!(await this.store.exists(digest))) {
        await this.store.put(digest, content);
        logger.debug({ digest, size: content.length }, 'Blob written');
      } else {
        logger.debug({ digest }, 'Blob already present, skipping write');
      }
      return this.blobs.record(repository, {
        digest,
        size: content.length,
        mediaType: mediaType || DEFAULT_BLOB_MEDIA_TYPE,
      });
    });
  }

  /**
   * Metadata of a blob uploaded to this repository.
   */
  async stat(repository: string, digest: string): Promise<BlobInfo> {
    const blob = this.blobs.get(digest);
    if (!blob || !this.blobs.isLinked(repository, digest)) {
      throw NotFoundError.blob(digest);
    }
    const size = await this.store.size(digest);
    if (size === null) {
      throw NotFoundError.blob(digest);
    }
    return { ...blob, size };
  }

  async get(repository: string, digest: string): Promise<{ info: BlobInfo; content: Buffer }> {
    const info = await this.stat(repository, digest);
    const content = await this.store.get(digest);
    if (!content) {
      throw NotFoundError.blob(digest);
    }
    return { info, content };
  }

  /**
   * Existence in the content store, regardless of repository.
   */
  async exists(digest: string): Promise<boolean> {
    return this.store.exists(digest);
  }

  /**
   * Unlink the blob from the repository; bytes go once nothing references the digest.
   */
  async delete(repository: string, digest: string): Promise<boolean> {
    if (!this.blobs.isLinked(repository, digest)) {
      throw NotFoundError.blob(digest);
    }
    return this.lock.run(digestLockKey(digest), async () => {
      this.blobs.unlink(repository, digest);
      return this.releaseLocked(digest);
    });
  }

  /**
   * Remove bytes for each digest no manifest row or blob row still references.
   * Returns the digests that were physically removed.
   */
  async release(digests: string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const digest of digests) {
      const deleted = await this.lock.run(digestLockKey(digest), () => this.releaseLocked(digest));
      if (deleted) removed.push(digest);
    }
    return removed;
  }

  /**
   * Drop blob rows orphaned by a repository cascade and release their bytes.
   */
  async pruneOrphans(): Promise<string[]> {
    return this.release(this.blobs.pruneUnlinked());
  }

  /**
   * Caller holds the digest lock.
   */
  async releaseLocked(digest: string): Promise<boolean> {
    if (this.manifests.countReferences(digest) > 0 || this.blobs.get(digest)) {
      return false;
    }
    const deleted = await this.store.delete(digest);
    if (deleted) {
      logger.debug({ digest }, 'Content removed');
    }
    return deleted;
  }
}
