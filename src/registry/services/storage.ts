/**
 * Content store - durable key-value byte storage addressed by digest
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { StoreUnavailableError } from '../errors';
import { parseDigest } from './digest';

/**
 * Narrow contract the registry core needs from durable blob storage.
 * get/exists/size report absence as null/false; any other failure rejects.
 */
export interface ContentStore {
  put(digest: string, content: Buffer): Promise<void>;
  get(digest: string): Promise<Buffer | null>;
  exists(digest: string): Promise<boolean>;
  size(digest: string): Promise<number | null>;
  delete(digest: string): Promise<boolean>;
  healthCheck(): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FilesystemContentStore implements ContentStore {
  private root: string;
  private blobsDir: string;
  private tmpDir: string;

  constructor(root: string = './data/registry') {
    this.root = root;
    this.blobsDir = path.join(root, 'blobs');
    this.tmpDir = path.join(root, 'tmp');
    this.initialize();
  }

  /**
   * Initialize storage directory structure
   */
  private initialize(): void {
    const dirs = [
      this.root,
      this.blobsDir,
      path.join(this.blobsDir, 'sha256'),
      path.join(this.blobsDir, 'sha512'),
      this.tmpDir,
    ];
    for (const dir of dirs) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Write through a temp file and rename, so readers never see partial content.
   */
  async put(digest: string, content: Buffer): Promise<void> {
    const target = this.getDigestPath(digest);
    const temp = path.join(this.tmpDir, `${crypto.randomUUID()}.part`);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(temp, content);
      await fs.promises.rename(temp, target);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      throw new StoreUnavailableError(`put ${digest}`, error);
    }
  }

  async get(digest: string): Promise<Buffer | null> {
    try {
      return await fs.promises.readFile(this.getDigestPath(digest));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StoreUnavailableError(`get ${digest}`, error);
    }
  }

  async exists(digest: string): Promise<boolean> {
    return (await this.size(digest)) !== null;
  }

  async size(digest: string): Promise<number | null> {
    try {
      const stat = await fs.promises.stat(this.getDigestPath(digest));
      return stat.size;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StoreUnavailableError(`stat ${digest}`, error);
    }
  }

  async delete(digest: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.getDigestPath(digest));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new StoreUnavailableError(`delete ${digest}`, error);
    }
  }

  async healthCheck(): Promise<void> {
    try {
      await fs.promises.access(this.blobsDir, fs.constants.R_OK | fs.constants.W_OK);
    } catch (error) {
      throw new StoreUnavailableError('health check', error);
    }
  }

  /**
   * Get blob path from digest: blobs/<alg>/<first two hex>/<rest>
   */
  private getDigestPath(digest: string): string {
    const parsed = parseDigest(digest);
    if (!parsed) {
      throw new Error(`Invalid digest format: ${digest}`);
    }
    return path.join(this.blobsDir, parsed.algorithm, parsed.hex.substring(0, 2), parsed.hex.substring(2));
  }
}

/**
 * In-process store for tests and ephemeral deployments.
 */
export class MemoryContentStore implements ContentStore {
  private objects: Map<string, Buffer> = new Map();

  async put(digest: string, content: Buffer): Promise<void> {
    this.objects.set(digest, Buffer.from(content));
  }

  async get(digest: string): Promise<Buffer | null> {
    const content = this.objects.get(digest);
    return content ? Buffer.from(content) : null;
  }

  async exists(digest: string): Promise<boolean> {
    return this.objects.has(digest);
  }

  async size(digest: string): Promise<number | null> {
    return this.objects.get(digest)?.length ?? null;
  }

  async delete(digest: string): Promise<boolean> {
    return this.objects.delete(digest);
  }

  async healthCheck(): Promise<void> {
    // always reachable
  }

  get count(): number {
    return this.objects.size;
  }
}
