/**
 * Express middleware shared by the registry routers
 */

import { NextFunction, Request, Response } from 'express';
import { createLogger } from '../logger';
import { ErrorCodes, ErrorResponse, OffsetMismatchError, UnauthorizedError, isRegistryError } from './errors';
import { ApiKeyResolver } from './services/access';
import { ANONYMOUS, Subject } from './types/registry';

const logger = createLogger('http');

declare global {
  namespace Express {
    interface Request {
      subject?: Subject;
    }
  }
}

export function getSubject(req: Request): Subject {
  return req.subject ?? ANONYMOUS;
}

/**
 * Log method, URL, status and duration of every request.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now();
  res.on('finish', () => {
    logger.debug(
      { method: req.method, url: req.originalUrl, status: res.statusCode, duration: Date.now() - started },
      'Request handled'
    );
  });
  next();
}

function extractApiKey(req: Request): string | undefined {
  const header = req.get('authorization');
  if (header && header.toLowerCase().startsWith('bearer ')) {
    return header.slice('bearer '.length).trim();
  }
  return req.get('x-api-key') || undefined;
}

/**
 * Resolve the API key, if any, into the request subject. No key leaves the client
 * anonymous; an unknown key is rejected.
 */
export function authenticate(resolver: ApiKeyResolver) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const key = extractApiKey(req);
    if (key === undefined) {
      next();
      return;
    }
    const subject = resolver.resolve(key);
    if (!subject) {
      next(new UnauthorizedError('invalid API key'));
      return;
    }
    req.subject = subject;
    next();
  };
}

/**
 * Map errors to the `{ errors: [...] }` body.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isRegistryError(error)) {
    if (error instanceof OffsetMismatchError) {
      res.set('Range', `0-${Math.max(error.currentOffset - 1, 0)}`);
    }
    if (error.statusCode === 401) {
      res.set('WWW-Authenticate', 'Bearer realm="registry"');
    }
    if (error.statusCode >= 500) {
      logger.error({ err: error, method: req.method, url: req.originalUrl }, error.message);
    }
    const body = req.method === 'HEAD' ? undefined : error.toResponse();
    res.status(error.statusCode);
    if (body) {
      res.json(body);
    } else {
      res.end();
    }
    return;
  }

  // body-parser failures carry their own 4xx status
  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== undefined) {
    const body: ErrorResponse = {
      errors: [
        {
          code: clientStatus === 413 ? ErrorCodes.SIZE_INVALID : ErrorCodes.UNSUPPORTED,
          message: error instanceof Error ? error.message : String(error),
        },
      ],
    };
    res.status(clientStatus).json(body);
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error({ err: error, method: req.method, url: req.originalUrl }, 'Unhandled registry error');
  const body: ErrorResponse = { errors: [{ code: ErrorCodes.UNKNOWN, message }] };
  res.status(500).json(body);
}

function clientErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    if (error.status >= 400 && error.status < 500) return error.status;
  }
  return undefined;
}
