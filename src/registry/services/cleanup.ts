/**
 * Upload cleanup service - periodically reclaims upload sessions idle past their TTL
 */

import { createLogger } from '../../logger';
import { BlobUploadManager } from './upload';

const logger = createLogger('upload-cleanup');

export class UploadCleanupService {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private uploads: BlobUploadManager,
    private intervalSeconds: number
  ) {}

  start(): void {
    if (this.timer !== null) {
      logger.warn('Upload cleanup service already running');
      return;
    }

    logger.info({ interval: this.intervalSeconds }, 'Starting upload cleanup service');
    this.schedule();
    this.timer = setInterval(() => this.schedule(), this.intervalSeconds * 1000);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Upload cleanup service stopped');
    }
    if (this.running) {
      try {
        await this.running;
      } catch (error) {
        logger.warn({ err: error }, 'Sweep in flight failed during shutdown');
      }
    }
  }

  /**
   * Run one sweep now; overlapping sweeps share the one in flight.
   */
  async runOnce(): Promise<number> {
    if (!this.running) {
      this.running = this.uploads.reclaimExpired().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private schedule(): void {
    this.runOnce().catch((error: unknown) => {
      logger.error({ err: error }, 'Upload cleanup failed');
    });
  }
}
