/**
 * Registry type definitions
 */

/**
 * Repository groups manifests, tags and blob links under one name
 */
export interface RepositoryInfo {
  name: string;
  createdAt: Date;
}

export interface RepositorySummary extends RepositoryInfo {
  tagCount: number;
  manifestCount: number;
}

/**
 * BlobInfo represents blob metadata
 */
export interface BlobInfo {
  digest: string;
  size: number;
  mediaType: string;
  createdAt: Date;
}

/**
 * UploadSession represents an in-progress, possibly chunked, blob upload
 */
export interface UploadSession {
  id: string;
  repository: string;
  offset: number;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface ManifestRecord {
  repository: string;
  digest: string;
  mediaType: string;
  size: number;
  createdAt: Date;
}

export interface TagRecord {
  repository: string;
  name: string;
  digest: string;
  updatedAt: Date;
}

/**
 * Manifest bytes exactly as pushed, with their identity
 */
export interface StoredManifest {
  digest: string;
  mediaType: string;
  size: number;
  content: Buffer;
}

export interface PutManifestResult {
  repository: string;
  digest: string;
  tag?: string;
  created: boolean;
  // content released because a tag repoint orphaned the previous manifest
  removedDigests: string[];
}

export interface DeleteManifestResult {
  removedTags: string[];
  removedDigests: string[];
}

export interface PageRequest {
  limit?: number;
  last?: string;
}

export interface Page<T> {
  items: T[];
  hasMore: boolean;
}

/**
 * Authenticated client identity; username is undefined for anonymous clients
 */
export interface Subject {
  username?: string;
}

export const ANONYMOUS: Subject = Object.freeze({});

// V2 API response bodies

export interface ApiVersionResponse {
  version: string;
  name: string;
}

export interface CatalogResponse {
  repositories: string[];
}

export interface TagListResponse {
  name: string;
  tags: string[];
}

export interface RepositoryListResponse {
  repositories: Array<{
    name: string;
    tagCount: number;
    manifestCount: number;
    createdAt: string;
  }>;
}

/**
 * A /v2 path after routing; `name` is the repository
 */
export type V2Route =
  | { kind: 'base' }
  | { kind: 'catalog' }
  | { kind: 'tags'; name: string }
  | { kind: 'manifest'; name: string; reference: string }
  | { kind: 'blob'; name: string; digest: string }
  | { kind: 'uploads'; name: string }
  | { kind: 'upload'; name: string; id: string };
