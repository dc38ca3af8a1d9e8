import { SqliteDB } from './database';
import {
  BlobInfo,
  ManifestRecord,
  RepositoryInfo,
  RepositorySummary,
  TagRecord,
  UploadSession,
} from '../registry/types/registry';

interface RepositoryRow {
  name: string;
  created_at: string;
}

interface RepositorySummaryRow extends RepositoryRow {
  tag_count: number;
  manifest_count: number;
}

interface BlobRow {
  digest: string;
  size: number;
  media_type: string;
  created_at: string;
}

interface ManifestRow {
  repository: string;
  digest: string;
  media_type: string;
  size: number;
  created_at: string;
}

interface TagRow {
  repository: string;
  name: string;
  digest: string;
  updated_at: string;
}

interface UploadRow {
  id: string;
  repository: string;
  byte_offset: number;
  created_at: string;
  updated_at: string;
}

interface CountRow {
  count: number;
}

export class RepositoriesRepository {
  constructor(private db: SqliteDB) {}

  create(name: string, now: Date = new Date()): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare('INSERT OR IGNORE INTO repositories (name, created_at) VALUES (?, ?)');
    return stmt.run(name, now.toISOString()).changes > 0;
  }

  get(name: string): RepositoryInfo | undefined {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], RepositoryRow>('SELECT * FROM repositories WHERE name = ?');
    const row = stmt.get(name);
    return row ? this.mapToRepository(row) : undefined;
  }

  exists(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Names in byte order, strictly after `last` when given
   */
  listNames(limit?: number, last?: string): string[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, number], { name: string }>(
      'SELECT name FROM repositories WHERE name > ? ORDER BY name ASC LIMIT ?'
    );
    return stmt.all(last ?? '', limit ?? -1).map((row) => row.name);
  }

  listSummaries(): RepositorySummary[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[], RepositorySummaryRow>(`
      SELECT r.name, r.created_at,
        (SELECT COUNT(*) FROM tags t WHERE t.repository = r.name) AS tag_count,
        (SELECT COUNT(*) FROM manifests m WHERE m.repository = r.name) AS manifest_count
      FROM repositories r
      ORDER BY r.name ASC
    `);
    return stmt.all().map((row) => ({
      ...this.mapToRepository(row),
      tagCount: row.tag_count,
      manifestCount: row.manifest_count,
    }));
  }

  delete(name: string): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare('DELETE FROM repositories WHERE name = ?');
    return stmt.run(name).changes > 0;
  }

  private mapToRepository(row: RepositoryRow): RepositoryInfo {
    return {
      name: row.name,
      createdAt: new Date(row.created_at),
    };
  }
}

export class BlobRepository {
  constructor(private db: SqliteDB) {}

  /**
   * Records the blob once per digest and links it to the repository.
   */
  record(repository: string, blob: Omit<BlobInfo, 'createdAt'>, now: Date = new Date()): BlobInfo {
    const database = this.db.getDatabase();
    this.db.transaction(() => {
      database
        .prepare('INSERT OR IGNORE INTO blobs (digest, size, media_type, created_at) VALUES (?, ?, ?, ?)')
        .run(blob.digest, blob.size, blob.mediaType, now.toISOString());
      database
        .prepare('INSERT OR IGNORE INTO repository_blobs (repository, digest, created_at) VALUES (?, ?, ?)')
        .run(repository, blob.digest, now.toISOString());
    });
    const stored = this.get(blob.digest);
    if (!stored) {
      throw new Error(`Blob ${blob.digest} missing after insert`);
    }
    return stored;
  }

  get(digest: string): BlobInfo | undefined {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], BlobRow>('SELECT * FROM blobs WHERE digest = ?');
    const row = stmt.get(digest);
    return row ? this.mapToBlob(row) : undefined;
  }

  isLinked(repository: string, digest: string): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, string], CountRow>(
      'SELECT COUNT(*) AS count FROM repository_blobs WHERE repository = ? AND digest = ?'
    );
    return (stmt.get(repository, digest)?.count ?? 0) > 0;
  }

  /**
   * Removes the repository link; drops the blob row once no repository links it.
   * Returns true when the blob row itself was removed.
   */
  unlink(repository: string, digest: string): boolean {
    const database = this.db.getDatabase();
    return this.db.transaction(() => {
      database.prepare('DELETE FROM repository_blobs WHERE repository = ? AND digest = ?').run(repository, digest);
      return this.dropIfUnlinked(digest);
    });
  }

  /**
   * Drops blob rows that lost their last repository link (after a repository cascade).
   */
  pruneUnlinked(): string[] {
    const database = this.db.getDatabase();
    const orphans = database
      .prepare<[], { digest: string }>(
        'SELECT digest FROM blobs WHERE digest NOT IN (SELECT digest FROM repository_blobs)'
      )
      .all()
      .map((row) => row.digest);
    const stmt = database.prepare('DELETE FROM blobs WHERE digest = ?');
    for (const digest of orphans) {
      stmt.run(digest);
    }
    return orphans;
  }

  private dropIfUnlinked(digest: string): boolean {
    const database = this.db.getDatabase();
    const links = database
      .prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM repository_blobs WHERE digest = ?')
      .get(digest);
    if ((links?.count ?? 0) > 0) return false;
    return database.prepare('DELETE FROM blobs WHERE digest = ?').run(digest).changes > 0;
  }

  private mapToBlob(row: BlobRow): BlobInfo {
    return {
      digest: row.digest,
      size: row.size,
      mediaType: row.media_type,
      createdAt: new Date(row.created_at),
    };
  }
}

export class ManifestRepository {
  constructor(private db: SqliteDB) {}

  /**
   * Inserts the manifest row unless the repository already holds this digest.
   * Returns true when a new row was created.
   */
  insert(record: Omit<ManifestRecord, 'createdAt'>, now: Date = new Date()): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare(`
      INSERT OR IGNORE INTO manifests (repository, digest, media_type, size, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);
    return stmt.run(record.repository, record.digest, record.mediaType, record.size, now.toISOString()).changes > 0;
  }

  get(repository: string, digest: string): ManifestRecord | undefined {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, string], ManifestRow>(
      'SELECT * FROM manifests WHERE repository = ? AND digest = ?'
    );
    const row = stmt.get(repository, digest);
    return row ? this.mapToManifest(row) : undefined;
  }

  listByRepository(repository: string): ManifestRecord[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], ManifestRow>(
      'SELECT * FROM manifests WHERE repository = ? ORDER BY digest ASC'
    );
    return stmt.all(repository).map((row) => this.mapToManifest(row));
  }

  delete(repository: string, digest: string): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare('DELETE FROM manifests WHERE repository = ? AND digest = ?');
    return stmt.run(repository, digest).changes > 0;
  }

  /**
   * Number of repositories still holding a manifest row for this digest.
   */
  countReferences(digest: string): number {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], CountRow>('SELECT COUNT(*) AS count FROM manifests WHERE digest = ?');
    return stmt.get(digest)?.count ?? 0;
  }

  private mapToManifest(row: ManifestRow): ManifestRecord {
    return {
      repository: row.repository,
      digest: row.digest,
      mediaType: row.media_type,
      size: row.size,
      createdAt: new Date(row.created_at),
    };
  }
}

export class TagRepository {
  constructor(private db: SqliteDB) {}

  /**
   * Creates the tag or repoints it. Returns the digest it pointed at before, if any.
   */
  upsert(repository: string, name: string, digest: string, now: Date = new Date()): string | undefined {
    const previous = this.get(repository, name);
    const database = this.db.getDatabase();
    const stmt = database.prepare(`
      INSERT INTO tags (repository, name, digest, updated_at) VALUES (?, ?, ?, ?)
      ON CONFLICT (repository, name) DO UPDATE SET digest = excluded.digest, updated_at = excluded.updated_at
    `);
    stmt.run(repository, name, digest, now.toISOString());
    return previous?.digest;
  }

  get(repository: string, name: string): TagRecord | undefined {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, string], TagRow>('SELECT * FROM tags WHERE repository = ? AND name = ?');
    const row = stmt.get(repository, name);
    return row ? this.mapToTag(row) : undefined;
  }

  listNames(repository: string): string[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], { name: string }>(
      'SELECT name FROM tags WHERE repository = ? ORDER BY name ASC'
    );
    return stmt.all(repository).map((row) => row.name);
  }

  listByDigest(repository: string, digest: string): string[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, string], { name: string }>(
      'SELECT name FROM tags WHERE repository = ? AND digest = ? ORDER BY name ASC'
    );
    return stmt.all(repository, digest).map((row) => row.name);
  }

  countForDigest(repository: string, digest: string): number {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string, string], CountRow>(
      'SELECT COUNT(*) AS count FROM tags WHERE repository = ? AND digest = ?'
    );
    return stmt.get(repository, digest)?.count ?? 0;
  }

  delete(repository: string, name: string): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare('DELETE FROM tags WHERE repository = ? AND name = ?');
    return stmt.run(repository, name).changes > 0;
  }

  private mapToTag(row: TagRow): TagRecord {
    return {
      repository: row.repository,
      name: row.name,
      digest: row.digest,
      updatedAt: new Date(row.updated_at),
    };
  }
}

export class UploadRepository {
  constructor(private db: SqliteDB, private ttlMs: number) {}

  create(id: string, repository: string, now: Date = new Date()): UploadSession {
    const database = this.db.getDatabase();
    const stmt = database.prepare(
      'INSERT INTO uploads (id, repository, byte_offset, created_at, updated_at) VALUES (?, ?, 0, ?, ?)'
    );
    stmt.run(id, repository, now.toISOString(), now.toISOString());
    const session = this.getById(id);
    if (!session) {
      throw new Error(`Upload ${id} missing after insert`);
    }
    return session;
  }

  getById(id: string): UploadSession | undefined {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], UploadRow>('SELECT * FROM uploads WHERE id = ?');
    const row = stmt.get(id);
    return row ? this.mapToUpload(row) : undefined;
  }

  updateOffset(id: string, offset: number, now: Date = new Date()): void {
    const database = this.db.getDatabase();
    const stmt = database.prepare('UPDATE uploads SET byte_offset = ?, updated_at = ? WHERE id = ?');
    stmt.run(offset, now.toISOString(), id);
  }

  delete(id: string): boolean {
    const database = this.db.getDatabase();
    const stmt = database.prepare('DELETE FROM uploads WHERE id = ?');
    return stmt.run(id).changes > 0;
  }

  listAll(): UploadSession[] {
    const database = this.db.getDatabase();
    const stmt = database.prepare<[], UploadRow>('SELECT * FROM uploads ORDER BY created_at ASC');
    return stmt.all().map((row) => this.mapToUpload(row));
  }

  /**
   * Sessions whose last activity is older than the TTL at `now`.
   */
  listExpired(now: Date = new Date()): UploadSession[] {
    const cutoff = new Date(now.getTime() - this.ttlMs).toISOString();
    const database = this.db.getDatabase();
    const stmt = database.prepare<[string], UploadRow>('SELECT * FROM uploads WHERE updated_at < ?');
    return stmt.all(cutoff).map((row) => this.mapToUpload(row));
  }

  private mapToUpload(row: UploadRow): UploadSession {
    const updatedAt = new Date(row.updated_at);
    return {
      id: row.id,
      repository: row.repository,
      offset: row.byte_offset,
      createdAt: new Date(row.created_at),
      updatedAt,
      expiresAt: new Date(updatedAt.getTime() + this.ttlMs),
    };
  }
}
