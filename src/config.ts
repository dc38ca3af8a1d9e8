/**
 * Configuration management for the registry.
 * Loads configuration from environment variables with defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export type Capability = 'read' | 'write';

export interface ServerConfig {
  host: string;
  port: number;
  maxBodySize: string;
}

export interface StorageConfig {
  root: string;
  dbPath: string;
  uploadTtl: number; // seconds of inactivity before a session expires
  cleanupInterval: number; // seconds
}

export interface ValidationConfig {
  repositoryNameMaxLength: number;
  tagMaxLength: number;
}

export interface RegistryPolicyConfig {
  autoCreateRepositories: boolean;
  strictManifestValidation: boolean;
}

export interface PaginationConfig {
  defaultLimit: number;
  maxLimit: number;
}

export interface CacheConfig {
  manifestTtl: number; // seconds
  tagTtl: number;
  catalogTtl: number;
  maxEntries: number;
  redisUrl?: string;
  sharedTtl: number;
}

export interface AccessRule {
  repository: string; // glob: "team/*", "**"
  users: string[]; // "*" for everyone, "anonymous" for unauthenticated clients
  capabilities: Capability[];
}

export interface AccessConfig {
  enabled: boolean;
  defaultPolicy: 'allow' | 'deny';
  adminUsers: string[];
  rules: AccessRule[];
}

export interface RegistryConfig {
  server: ServerConfig;
  storage: StorageConfig;
  validation: ValidationConfig;
  policy: RegistryPolicyConfig;
  pagination: PaginationConfig;
  cache: CacheConfig;
  access: AccessConfig;
  apiKeys: Record<string, string>;
}

type Env = Record<string, string | undefined>;

function parsePort(value: string | undefined, defaultPort: number): number {
  const parsed = parseInt(value ?? '', 10);
  if (isNaN(parsed) || parsed < 0 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  const parsed = parseInt(value ?? '', 10);
  if (isNaN(parsed) || parsed <= 0) {
    return defaultValue;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * Parses "key:user,key2:user2" into a key → username map.
 */
export function parseApiKeys(value: string | undefined): Record<string, string> {
  const keys: Record<string, string> = {};
  if (!value) return keys;

  for (const pair of value.split(',')) {
    const separator = pair.indexOf(':');
    if (separator <= 0) continue;
    const key = pair.slice(0, separator).trim();
    const user = pair.slice(separator + 1).trim();
    if (key && user) {
      keys[key] = user;
    }
  }
  return keys;
}

const accessConfigSchema = z.object({
  enabled: z.boolean().default(true),
  defaultPolicy: z.enum(['allow', 'deny']).default('allow'),
  adminUsers: z.array(z.string()).default([]),
  rules: z
    .array(
      z.object({
        repository: z.string().min(1),
        users: z.array(z.string()),
        capabilities: z.array(z.enum(['read', 'write'])),
      }),
    )
    .default([]),
});

/**
 * Reads access rules from a JSON file. A missing path disables access control.
 */
export function loadAccessConfig(filePath: string | undefined): AccessConfig {
  if (!filePath) {
    return { enabled: false, defaultPolicy: 'allow', adminUsers: [], rules: [] };
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = accessConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid access config ${filePath}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Loads configuration from environment variables with defaults.
 */
export function loadConfig(env: Env = process.env): RegistryConfig {
  const root = path.resolve(env.REGISTRY_STORAGE || './data/registry');

  return {
    server: {
      host: env.REGISTRY_HOST || '0.0.0.0',
      port: parsePort(env.REGISTRY_PORT, 5000),
      maxBodySize: env.REGISTRY_MAX_BODY_SIZE || '10gb',
    },
    storage: {
      root,
      dbPath: env.REGISTRY_DB_PATH || path.join(root, 'registry.db'),
      uploadTtl: parsePositiveInt(env.REGISTRY_UPLOAD_TTL, 3600),
      cleanupInterval: parsePositiveInt(env.REGISTRY_UPLOAD_CLEANUP_INTERVAL, 300),
    },
    validation: {
      repositoryNameMaxLength: parsePositiveInt(env.REGISTRY_REPOSITORY_NAME_MAX_LENGTH, 255),
      tagMaxLength: parsePositiveInt(env.REGISTRY_TAG_MAX_LENGTH, 128),
    },
    policy: {
      autoCreateRepositories: parseBoolean(env.REGISTRY_AUTO_CREATE_REPOSITORIES, true),
      strictManifestValidation: parseBoolean(env.REGISTRY_STRICT_MANIFEST_VALIDATION, false),
    },
    pagination: {
      defaultLimit: parsePositiveInt(env.REGISTRY_PAGINATION_DEFAULT_LIMIT, 100),
      maxLimit: parsePositiveInt(env.REGISTRY_PAGINATION_MAX_LIMIT, 1000),
    },
    cache: {
      manifestTtl: parsePositiveInt(env.REGISTRY_CACHE_MANIFEST_TTL, 300),
      tagTtl: parsePositiveInt(env.REGISTRY_CACHE_TAG_TTL, 120),
      catalogTtl: parsePositiveInt(env.REGISTRY_CACHE_CATALOG_TTL, 60),
      maxEntries: parsePositiveInt(env.REGISTRY_CACHE_MAX_ENTRIES, 10000),
      redisUrl: env.REGISTRY_REDIS_URL || undefined,
      sharedTtl: parsePositiveInt(env.REGISTRY_CACHE_SHARED_TTL, 30),
    },
    access: loadAccessConfig(env.REGISTRY_ACCESS_CONFIG),
    apiKeys: parseApiKeys(env.REGISTRY_API_KEYS),
  };
}
