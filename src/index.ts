/**
 * Registry Server - Entry point
 */

import { loadConfig } from './config';
import { createServer } from './server';
import { logger } from './logger';

const config = loadConfig();
const { start, stop } = createServer(config);

logger.info('Starting registry server (storage: %s, db: %s)', config.storage.root, config.storage.dbPath);
start().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});

let stopping = false;
function shutdown(signal: NodeJS.Signals): void {
  if (stopping) return;
  stopping = true;
  logger.info('Received %s, shutting down', signal);
  stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
