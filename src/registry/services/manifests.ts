/**
 * Manifest & tag store
 *
 * Manifest bytes are stored once in the content store under their digest; SQLite holds
 * which repositories carry which manifests and where each tag points.
 */

import { ZodError } from 'zod';
import { RegistryPolicyConfig } from '../../config';
import { SqliteDB } from '../../db/database';
import { ManifestRepository, RepositoriesRepository, TagRepository } from '../../db/repository';
import { createLogger } from '../../logger';
import { ErrorCodes, ManifestInvalidError, NotFoundError } from '../errors';
import {
  IMAGE_MANIFEST_TYPES,
  INDEX_TYPES,
  ManifestMediaType,
  MediaTypes,
  ParsedManifest,
  imageIndexSchema,
  imageManifestSchema,
  isManifestMediaType,
} from '../types/manifest';
import {
  DeleteManifestResult,
  PageRequest,
  PutManifestResult,
  RepositorySummary,
  StoredManifest,
} from '../types/registry';
import { NamePolicy } from '../utils/validation';
import { BlobService, digestLockKey } from './blobs';
import { computeDigest, verifyDigest } from './digest';
import { KeyedLock } from './lock';
import { ContentStore } from './storage';

const logger = createLogger('manifests');

export interface ManifestStoreOptions {
  db: SqliteDB;
  store: ContentStore;
  blobs: BlobService;
  lock: KeyedLock;
  names?: NamePolicy;
  policy?: RegistryPolicyConfig;
}

export function tagLockKey(repository: string, tag: string): string {
  return `tag:${repository}:${tag}`;
}

/**
 * A reference containing ':' names a digest; anything else names a tag.
 */
export function isDigestReference(reference: string): boolean {
  return reference.includes(':');
}

function describeZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function stripParameters(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

function readMediaTypeField(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'mediaType' in body && typeof body.mediaType === 'string') {
    return body.mediaType;
  }
  return undefined;
}

function hasField(body: unknown, field: string): boolean {
  return typeof body === 'object' && body !== null && field in body;
}

/**
 * Resolve the manifest media type from the request content type, falling back to
 * the body's own mediaType field and finally to its shape.
 */
function resolveMediaType(body: unknown, contentType: string | undefined): ManifestMediaType {
  const declared = stripParameters(contentType);
  if (isManifestMediaType(declared)) return declared;

  const field = readMediaTypeField(body);
  if (field !== undefined) {
    if (isManifestMediaType(field)) return field;
    throw new ManifestInvalidError(`unsupported manifest media type ${field}`, { mediaType: field });
  }
  if (declared && declared !== 'application/json' && declared !== 'application/octet-stream') {
    throw new ManifestInvalidError(`unsupported manifest media type ${declared}`, { mediaType: declared });
  }
  if (hasField(body, 'manifests')) return MediaTypes.OCI_INDEX;
  if (hasField(body, 'layers')) return MediaTypes.OCI_MANIFEST;
  throw new ManifestInvalidError('cannot determine manifest media type');
}

/**
 * Parse and structurally validate raw manifest bytes.
 */
export function parseManifest(raw: Buffer, contentType?: string): ParsedManifest {
  let body: unknown;
  try {
    body = JSON.parse(raw.toString('utf-8'));
  } catch (error) {
    throw new ManifestInvalidError('manifest is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const mediaType = resolveMediaType(body, contentType);
  const field = readMediaTypeField(body);
  if (field !== undefined && field !== mediaType) {
    throw new ManifestInvalidError(`manifest mediaType ${field} does not match ${mediaType}`, {
      mediaType: field,
    });
  }

  if (IMAGE_MANIFEST_TYPES.includes(mediaType)) {
    const parsed = imageManifestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ManifestInvalidError(`invalid image manifest: ${describeZodError(parsed.error)}`);
    }
    return { kind: 'image', mediaType, manifest: parsed.data };
  }
  if (INDEX_TYPES.includes(mediaType)) {
    const parsed = imageIndexSchema.safeParse(body);
    if (!parsed.success) {
      throw new ManifestInvalidError(`invalid image index: ${describeZodError(parsed.error)}`);
    }
    return { kind: 'index', mediaType, manifest: parsed.data };
  }
  throw new ManifestInvalidError(`unsupported manifest media type ${mediaType}`, { mediaType });
}

export class ManifestStore {
  private repositories: RepositoriesRepository;
  private manifests: ManifestRepository;
  private tags: TagRepository;
  private db: SqliteDB;
  private store: ContentStore;
  private blobs: BlobService;
  private lock: KeyedLock;
  private names: NamePolicy;
  private policy: RegistryPolicyConfig;

  constructor(options: ManifestStoreOptions) {
    this.db = options.db;
    this.repositories = new RepositoriesRepository(options.db);
    this.manifests = new ManifestRepository(options.db);
    this.tags = new TagRepository(options.db);
    this.store = options.store;
    this.blobs = options.blobs;
    this.lock = options.lock;
    this.names = options.names ?? new NamePolicy();
    this.policy = options.policy ?? { autoCreateRepositories: true, strictManifestValidation: false };
  }

  /**
   * Entry transition of every write path: an unknown repository is created when
   * auto-creation is on, otherwise the write fails with NAME_UNKNOWN.
   * Returns true when the repository was created by this call.
   */
  ensureRepository(name: string): boolean {
    this.names.assertRepository(name);
    if (this.repositories.exists(name)) return false;
    if (!this.policy.autoCreateRepositories) {
      throw NotFoundError.repository(name);
    }
    const created = this.repositories.create(name);
    if (created) {
      logger.info({ repository: name }, 'Repository created on first write');
    }
    return created;
  }

  /**
   * Explicitly create a repository. Returns false when it already existed.
   */
  createRepository(name: string): boolean {
    this.names.assertRepository(name);
    const created = this.repositories.create(name);
    if (created) {
      logger.info({ repository: name }, 'Repository created');
    }
    return created;
  }

  repositoryExists(name: string): boolean {
    return this.repositories.exists(name);
  }

  /**
   * Delete a repository with its manifests, tags, blob links and open sessions.
   * Returns the digests whose content was physically removed.
   */
  async deleteRepository(name: string): Promise<string[]> {
    if (!this.repositories.exists(name)) {
      throw NotFoundError.repository(name);
    }
    const digests = this.manifests.listByRepository(name).map((manifest) => manifest.digest);
    this.repositories.delete(name);
    const removed = [...(await this.blobs.release(digests)), ...(await this.blobs.pruneOrphans())];
    logger.info({ repository: name, removed: removed.length }, 'Repository deleted');
    return removed;
  }

  listRepositories(page: PageRequest = {}): string[] {
    return this.repositories.listNames(page.limit, page.last);
  }

  listRepositorySummaries(): RepositorySummary[] {
    return this.repositories.listSummaries();
  }

  /**
   * Store a manifest under a tag or under its own digest.
   */
  async putManifest(
    repository: string,
    reference: string,
    raw: Buffer,
    contentType?: string
  ): Promise<PutManifestResult> {
    this.names.assertRepository(repository);

    let tag: string | undefined;
    if (isDigestReference(reference)) {
      verifyDigest(raw, reference);
    } else {
      this.names.assertTag(reference);
      tag = reference;
    }

    const parsed = parseManifest(raw, contentType);
    const digest = tag === undefined ? reference : computeDigest(raw);

    if (this.policy.strictManifestValidation) {
      await this.assertReferencesExist(repository, parsed);
    }

    const keys = tag === undefined ? [digestLockKey(digest)] : [tagLockKey(repository, tag), digestLockKey(digest)];

    const { created, orphaned } = await this.lock.runAll(keys, async () => {
      if (!(await this.store.exists(digest))) {
        await this.store.put(digest, raw);
      }
      return this.db.transaction(() => {
        const inserted = this.manifests.insert({
          repository,
          digest,
          mediaType: parsed.mediaType,
          size: raw.length,
        });
        let previousDigest: string | undefined;
        if (tag !== undefined) {
          const previous = this.tags.upsert(repository, tag, digest);
          if (previous !== undefined && previous !== digest && this.tags.countForDigest(repository, previous) === 0) {
            this.manifests.delete(repository, previous);
            previousDigest = previous;
          }
        }
        return { created: inserted, orphaned: previousDigest };
      });
    });

    const removedDigests = orphaned === undefined ? [] : await this.blobs.release([orphaned]);

    logger.info({ repository, reference, digest, created }, 'Manifest stored');
    return { repository, digest, ...(tag !== undefined && { tag }), created, removedDigests };
  }

  /**
   * Fetch manifest bytes by tag or digest.
   */
  async getManifest(repository: string, reference: string): Promise<StoredManifest> {
    if (!this.repositories.exists(repository)) {
      throw NotFoundError.repository(repository);
    }
    const digest = isDigestReference(reference) ? reference : this.resolveTag(repository, reference);
    return this.loadManifest(repository, digest);
  }

  /**
   * Digest a tag currently points at.
   */
  resolveTag(repository: string, tag: string): string {
    const record = this.tags.get(repository, tag);
    if (!record) {
      throw NotFoundError.manifest(repository, tag);
    }
    return record.digest;
  }

  async loadManifest(repository: string, digest: string): Promise<StoredManifest> {
    const record = this.manifests.get(repository, digest);
    if (!record) {
      throw NotFoundError.manifest(repository, digest);
    }
    const content = await this.store.get(digest);
    if (!content) {
      logger.error({ repository, digest }, 'Manifest row without content');
      throw NotFoundError.manifest(repository, digest);
    }
    return { digest, mediaType: record.mediaType, size: content.length, content };
  }

  hasManifest(repository: string, digest: string): boolean {
    return this.manifests.get(repository, digest) !== undefined;
  }

  listTags(repository: string): string[] {
    if (!this.repositories.exists(repository)) {
      throw NotFoundError.repository(repository);
    }
    return this.tags.listNames(repository);
  }

  /**
   * Remove a tag; its manifest goes too once no other tag points at it.
   */
  async deleteTag(repository: string, tag: string): Promise<DeleteManifestResult> {
    if (!this.repositories.exists(repository)) {
      throw NotFoundError.repository(repository);
    }
    return this.lock.run(tagLockKey(repository, tag), async () => {
      const record = this.tags.get(repository, tag);
      if (!record) {
        throw NotFoundError.manifest(repository, tag);
      }
      return this.lock.run(digestLockKey(record.digest), async () => {
        const manifestRemoved = this.db.transaction(() => {
          this.tags.delete(repository, tag);
          if (this.tags.countForDigest(repository, record.digest) === 0) {
            return this.manifests.delete(repository, record.digest);
          }
          return false;
        });
        const removedDigests =
          manifestRemoved && (await this.blobs.releaseLocked(record.digest)) ? [record.digest] : [];
        logger.info({ repository, tag, digest: record.digest, manifestRemoved }, 'Tag deleted');
        return { removedTags: [tag], removedDigests };
      });
    });
  }

  /**
   * A tag reference deletes the tag; a digest reference deletes the manifest
   * and every tag of this repository pointing at it.
   */
  async deleteManifest(repository: string, reference: string): Promise<DeleteManifestResult> {
    if (!isDigestReference(reference)) {
      return this.deleteTag(repository, reference);
    }
    if (!this.repositories.exists(repository)) {
      throw NotFoundError.repository(repository);
    }
    return this.lock.run(digestLockKey(reference), async () => {
      if (!this.manifests.get(repository, reference)) {
        throw NotFoundError.manifest(repository, reference);
      }
      const removedTags = this.db.transaction(() => {
        const tags = this.tags.listByDigest(repository, reference);
        for (const tag of tags) {
          this.tags.delete(repository, tag);
        }
        this.manifests.delete(repository, reference);
        return tags;
      });
      const removedDigests = (await this.blobs.releaseLocked(reference)) ? [reference] : [];
      logger.info({ repository, digest: reference, removedTags }, 'Manifest deleted');
      return { removedTags, removedDigests };
    });
  }

  private async assertReferencesExist(repository: string, parsed: ParsedManifest): Promise<void> {
    if (parsed.kind === 'image') {
      for (const descriptor of [parsed.manifest.config, ...parsed.manifest.layers]) {
        if (!(await this.blobs.exists(descriptor.digest))) {
          throw new ManifestInvalidError(
            `referenced blob ${descriptor.digest} is unknown`,
            { digest: descriptor.digest },
            ErrorCodes.MANIFEST_BLOB_UNKNOWN
          );
        }
      }
      return;
    }
    for (const child of parsed.manifest.manifests) {
      if (!this.hasManifest(repository, child.digest)) {
        throw new ManifestInvalidError(
          `referenced manifest ${child.digest} is unknown`,
          { digest: child.digest },
          ErrorCodes.MANIFEST_BLOB_UNKNOWN
        );
      }
    }
  }
}
