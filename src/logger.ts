/**
 * Logger module - structured pino logging, with file rotation when LOG_DIR is set
 */

import pino, { Logger, TransportTargetOptions } from 'pino';
import * as path from 'path';

function rollingTarget(logDir: string): TransportTargetOptions {
  return {
    target: 'pino-roll',
    options: {
      file: path.join(logDir, 'registry.log'),
      size: process.env.LOG_MAX_SIZE || '100m',
      limit: { count: parseInt(process.env.LOG_MAX_FILES || '7', 10) },
      frequency: process.env.LOG_FREQUENCY || 'daily',
      mkdir: true,
    },
  };
}

function buildLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const logDir = process.env.LOG_DIR;

  const options: pino.LoggerOptions = {
    level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };

  if (!isTest && logDir) {
    return pino({ ...options, transport: rollingTarget(logDir) });
  }
  return pino(options);
}

export const logger = buildLogger();

// Create child loggers for different modules
export const createLogger = (name: string): Logger => {
  return logger.child({ module: name });
};

export default logger;
