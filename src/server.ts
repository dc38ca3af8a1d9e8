/**
 * Registry HTTP Server using Express
 */

import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { RegistryConfig } from './config';
import { SqliteDB } from './db/database';
import { createLogger } from './logger';
import { authenticate, errorHandler, requestLogger } from './registry/middleware';
import { createHealthRouter } from './registry/routes/health';
import { createRepositoriesRouter } from './registry/routes/repositories';
import { createV2Router } from './registry/routes/v2';
import { AccessController, ApiKeyResolver } from './registry/services/access';
import { RegistryCache, SharedCache, createSharedCache } from './registry/services/cache';
import { UploadCleanupService } from './registry/services/cleanup';
import { RegistryService } from './registry/services/registry';
import { ContentStore, FilesystemContentStore } from './registry/services/storage';

const logger = createLogger('server');

/**
 * Collaborators a caller may substitute, e.g. in-memory stores in tests.
 */
export interface ServerOverrides {
  db?: SqliteDB;
  store?: ContentStore;
  sharedCache?: SharedCache;
  now?: () => Date;
}

export interface RegistryServer {
  app: Express;
  registry: RegistryService;
  cleanup: UploadCleanupService;
  start(): Promise<Server>;
  stop(): Promise<void>;
}

export function createServer(config: RegistryConfig, overrides: ServerOverrides = {}): RegistryServer {
  const db = overrides.db ?? new SqliteDB(config.storage.dbPath);
  const store = overrides.store ?? new FilesystemContentStore(config.storage.root);
  const cache = new RegistryCache(config.cache, overrides.sharedCache ?? createSharedCache(config.cache));
  const access = new AccessController(config.access);
  const apiKeys = new ApiKeyResolver(config.apiKeys);
  const registry = new RegistryService({
    config,
    db,
    store,
    cache,
    access,
    now: overrides.now,
  });
  const cleanup = new UploadCleanupService(registry.uploads, config.storage.cleanupInterval);

  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(authenticate(apiKeys));

  // Raw body for blob and manifest uploads, whatever the content type
  app.use('/v2', express.raw({ type: () => true, limit: config.server.maxBodySize }));
  app.use('/v2', createV2Router(registry, config.pagination));

  // JSON parsing for management routes
  app.use('/api/v1/registry/repositories', express.json(), createRepositoriesRouter(registry));
  app.use('/health', createHealthRouter(registry));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ errors: [{ code: 'UNSUPPORTED', message: `route ${req.method} ${req.path} not found` }] });
  });
  app.use(errorHandler);

  let server: Server | null = null;

  return {
    app,
    registry,
    cleanup,

    start(): Promise<Server> {
      return new Promise((resolve, reject) => {
        const listening = app.listen(config.server.port, config.server.host, () => {
          logger.info(
            { accessControl: access.isEnabled(), apiKeys: apiKeys.enabled },
            `Registry server listening on ${config.server.host}:${config.server.port}`
          );
          cleanup.start();
          server = listening;
          resolve(listening);
        });
        listening.once('error', reject);
      });
    },

    async stop(): Promise<void> {
      await cleanup.stop();
      const current = server;
      server = null;
      if (current) {
        await new Promise<void>((resolve, reject) => {
          current.close((error) => (error ? reject(error) : resolve()));
        });
      }
      await registry.close();
      db.close();
      logger.info('Registry server stopped');
    },
  };
}
