/**
 * SQLite Database Module - registry metadata (repositories, blobs, manifests, tags, uploads)
 */

import Database, { Database as DatabaseType } from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export class SqliteDB {
  private db: DatabaseType;

  constructor(dbPath: string = ':memory:') {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.initializeTables();
  }

  private initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS repositories (
        name TEXT PRIMARY KEY,
        created_at TEXT NOT NULL
      )
    `);

    // Blobs are global by digest; repository_blobs records per-repository ownership
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS blobs (
        digest TEXT PRIMARY KEY,
        size INTEGER NOT NULL,
        media_type TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS repository_blobs (
        repository TEXT NOT NULL REFERENCES repositories(name) ON DELETE CASCADE,
        digest TEXT NOT NULL REFERENCES blobs(digest) ON DELETE CASCADE,
        created_at TEXT NOT NULL,
        PRIMARY KEY (repository, digest)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS manifests (
        repository TEXT NOT NULL REFERENCES repositories(name) ON DELETE CASCADE,
        digest TEXT NOT NULL,
        media_type TEXT NOT NULL,
        size INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (repository, digest)
      )
    `);

    // A tag can only point at a manifest row of the same repository
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tags (
        repository TEXT NOT NULL,
        name TEXT NOT NULL,
        digest TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (repository, name),
        FOREIGN KEY (repository, digest) REFERENCES manifests(repository, digest) ON DELETE CASCADE
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS uploads (
        id TEXT PRIMARY KEY,
        repository TEXT NOT NULL REFERENCES repositories(name) ON DELETE CASCADE,
        byte_offset INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_tags_digest ON tags(repository, digest);
      CREATE INDEX IF NOT EXISTS idx_manifests_digest ON manifests(digest);
      CREATE INDEX IF NOT EXISTS idx_uploads_updated_at ON uploads(updated_at);
    `);
  }

  getDatabase(): DatabaseType {
    return this.db;
  }

  /**
   * Run fn inside a single SQLite transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
