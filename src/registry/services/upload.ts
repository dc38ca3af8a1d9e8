/**
 * Blob upload manager
 *
 * Session lifecycle: Created -> Accepting(offset) -> Completed | Cancelled | Expired.
 * Session metadata lives in SQLite; received bytes are spooled to
 * <root>/uploads/<id>/data until the upload completes.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { SqliteDB } from '../../db/database';
import { UploadRepository } from '../../db/repository';
import { createLogger } from '../../logger';
import {
  DigestMismatchError,
  OffsetMismatchError,
  SessionExpiredError,
  SessionNotFoundError,
  StoreUnavailableError,
} from '../errors';
import { BlobInfo, UploadSession } from '../types/registry';
import { NamePolicy, isValidUUID } from '../utils/validation';
import { BlobService } from './blobs';
import { verifyDigest } from './digest';
import { KeyedLock } from './lock';

const logger = createLogger('upload');

export interface UploadManagerOptions {
  db: SqliteDB;
  blobs: BlobService;
  lock: KeyedLock;
  spoolRoot: string;
  ttlSeconds: number;
  names?: NamePolicy;
  now?: () => Date;
}

export function uploadLockKey(id: string): string {
  return `upload:${id}`;
}

export class BlobUploadManager {
  private uploads: UploadRepository;
  private blobs: BlobService;
  private lock: KeyedLock;
  private spoolRoot: string;
  private names: NamePolicy;
  private now: () => Date;

  constructor(options: UploadManagerOptions) {
    this.uploads = new UploadRepository(options.db, options.ttlSeconds * 1000);
    this.blobs = options.blobs;
    this.lock = options.lock;
    this.spoolRoot = options.spoolRoot;
    this.names = options.names ?? new NamePolicy();
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(this.spoolRoot, { recursive: true });
  }

  /**
   * Open a session at offset 0. The repository row must already exist.
   */
  async start(repository: string): Promise<UploadSession> {
    this.names.assertRepository(repository);
    const id = crypto.randomUUID();
    try {
      await fs.promises.mkdir(this.sessionDir(id), { recursive: true });
      await fs.promises.writeFile(this.spoolPath(id), Buffer.alloc(0));
    } catch (error) {
      throw new StoreUnavailableError(`create upload ${id}`, error);
    }
    const session = this.uploads.create(id, repository, this.now());
    logger.info({ id, repository }, 'Upload started');
    return session;
  }

  /**
   * Append bytes at the current offset. When `expectedStartOffset` is given it must
   * equal the current offset, otherwise the session is left untouched.
   */
  async appendChunk(id: string, chunk: Buffer, expectedStartOffset?: number): Promise<number> {
    return this.lock.run(uploadLockKey(id), async () => {
      const session = await this.getLive(id);
      if (expectedStartOffset !== undefined && expectedStartOffset !== session.offset) {
        throw new OffsetMismatchError(expectedStartOffset, session.offset);
      }
      try {
        // drop bytes a failed append may have left past the recorded offset
        await fs.promises.truncate(this.spoolPath(id), session.offset);
        await fs.promises.appendFile(this.spoolPath(id), chunk);
      } catch (error) {
        throw new StoreUnavailableError(`append upload ${id}`, error);
      }
      const offset = session.offset + chunk.length;
      this.uploads.updateOffset(id, offset, this.now());
      logger.debug({ id, offset, chunk: chunk.length }, 'Chunk appended');
      return offset;
    });
  }

  /**
   * Assemble spooled bytes plus `finalChunk`, verify them against `expectedDigest`
   * and commit the blob. A mismatch discards the session and writes nothing.
   */
  async complete(id: string, finalChunk: Buffer, expectedDigest: string, mediaType?: string): Promise<BlobInfo> {
    return this.lock.run(uploadLockKey(id), async () => {
      const session = await this.getLive(id);
      let spooled: Buffer;
      try {
        spooled = (await fs.promises.readFile(this.spoolPath(id))).subarray(0, session.offset);
      } catch (error) {
        throw new StoreUnavailableError(`read upload ${id}`, error);
      }

      const content = Buffer.concat([spooled, finalChunk]);
      try {
        verifyDigest(content, expectedDigest);
      } catch (error) {
        if (error instanceof DigestMismatchError) {
          await this.discard(id);
          logger.warn({ id, expected: expectedDigest, detail: error.detail }, 'Upload digest mismatch');
        }
        throw error;
      }

      const blob = await this.blobs.commit(session.repository, expectedDigest, content, mediaType);
      await this.discard(id);
      logger.info({ id, repository: session.repository, digest: blob.digest, size: blob.size }, 'Upload completed');
      return blob;
    });
  }

  /**
   * Single-request upload: verify and commit without a session.
   */
  async upload(repository: string, content: Buffer, expectedDigest: string, mediaType?: string): Promise<BlobInfo> {
    this.names.assertRepository(repository);
    verifyDigest(content, expectedDigest);
    return this.blobs.commit(repository, expectedDigest, content, mediaType);
  }

  /**
   * Discard the session and its bytes. Unknown ids are ignored.
   */
  async cancel(id: string): Promise<void> {
    await this.lock.run(uploadLockKey(id), async () => {
      if (this.uploads.getById(id)) {
        await this.discard(id);
        logger.info({ id }, 'Upload cancelled');
      }
    });
  }

  /**
   * Cancel every open session of a repository, ahead of deleting it.
   */
  async cancelRepository(repository: string): Promise<number> {
    const sessions = this.uploads.listAll().filter((session) => session.repository === repository);
    for (const session of sessions) {
      await this.cancel(session.id);
    }
    return sessions.length;
  }

  async status(id: string): Promise<UploadSession> {
    return this.lock.run(uploadLockKey(id), () => this.getLive(id));
  }

  /**
   * Delete sessions idle past the TTL. Returns how many were reclaimed.
   */
  async reclaimExpired(now: Date = this.now()): Promise<number> {
    let reclaimed = 0;
    for (const session of this.uploads.listExpired(now)) {
      await this.lock.run(uploadLockKey(session.id), async () => {
        const current = this.uploads.getById(session.id);
        if (current && current.expiresAt.getTime() < now.getTime()) {
          await this.discard(session.id);
          reclaimed++;
        }
      });
    }
    if (reclaimed > 0) {
      logger.info({ reclaimed }, 'Expired uploads reclaimed');
    }
    return reclaimed;
  }

  private async getLive(id: string): Promise<UploadSession> {
    if (!isValidUUID(id)) {
      throw new SessionNotFoundError(id);
    }
    const session = this.uploads.getById(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    if (session.expiresAt.getTime() <= this.now().getTime()) {
      await this.discard(id);
      throw new SessionExpiredError(id);
    }
    return session;
  }

  private async discard(id: string): Promise<void> {
    this.uploads.delete(id);
    try {
      await fs.promises.rm(this.sessionDir(id), { recursive: true, force: true });
    } catch (error) {
      throw new StoreUnavailableError(`remove upload ${id}`, error);
    }
  }

  private sessionDir(id: string): string {
    return path.join(this.spoolRoot, id);
  }

  private spoolPath(id: string): string {
    return path.join(this.sessionDir(id), 'data');
  }
}
