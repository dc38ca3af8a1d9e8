/**
 * Docker Registry HTTP API V2 routes
 */

import { NextFunction, Request, Response, Router } from 'express';
import { PaginationConfig } from '../../config';
import { createLogger } from '../../logger';
import { SizeInvalidError } from '../errors';
import { getSubject } from '../middleware';
import { RegistryService } from '../services/registry';
import {
  ApiVersionResponse,
  CatalogResponse,
  Page,
  TagListResponse,
  UploadSession,
  V2Route,
} from '../types/registry';
import { buildPaginationLink, parsePaginationParams } from '../utils/pagination';

const logger = createLogger('v2');

export const API_VERSION_HEADER = 'Docker-Distribution-API-Version';
export const API_VERSION = 'registry/2.0';

const ROUTE_PATTERNS: Array<[RegExp, (match: RegExpMatchArray) => V2Route]> = [
  [/^(.+)\/tags\/list$/, (m) => ({ kind: 'tags', name: m[1] })],
  [/^(.+)\/manifests\/([^/]+)$/, (m) => ({ kind: 'manifest', name: m[1], reference: m[2] })],
  [/^(.+)\/blobs\/uploads\/?$/, (m) => ({ kind: 'uploads', name: m[1] })],
  [/^(.+)\/blobs\/uploads\/([^/]+)$/, (m) => ({ kind: 'upload', name: m[1], id: m[2] })],
  [/^(.+)\/blobs\/([^/]+)$/, (m) => ({ kind: 'blob', name: m[1], digest: m[2] })],
];

/**
 * Route a path relative to /v2 (no leading slash). Repository names may contain slashes.
 */
export function parseV2Path(path: string): V2Route | null {
  if (path === '' || path === '/') return { kind: 'base' };
  if (path === '_catalog') return { kind: 'catalog' };
  for (const [pattern, build] of ROUTE_PATTERNS) {
    const match = path.match(pattern);
    if (match) return build(match);
  }
  return null;
}

/**
 * Parse a Content-Range header ("start-end", optionally prefixed by "bytes=" or "bytes ").
 */
export function parseContentRange(header: string): { start: number; end: number } {
  const match = header.trim().match(/^(?:bytes[= ])?(\d+)-(\d+)$/);
  if (!match) {
    throw new SizeInvalidError(`malformed Content-Range ${header}`, { contentRange: header });
  }
  const start = parseInt(match[1], 10);
  const end = parseInt(match[2], 10);
  if (end < start) {
    throw new SizeInvalidError(`Content-Range end precedes start: ${header}`, { contentRange: header });
  }
  return { start, end };
}

/**
 * Range header value for `offset` bytes received.
 */
export function rangeHeader(offset: number): string {
  return `0-${Math.max(offset - 1, 0)}`;
}

function bodyOf(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

function uploadLocation(name: string, id: string): string {
  return `/v2/${name}/blobs/uploads/${id}`;
}

function setUploadHeaders(res: Response, name: string, session: Pick<UploadSession, 'id' | 'offset'>): void {
  res.set('Location', uploadLocation(name, session.id));
  res.set('Docker-Upload-UUID', session.id);
  res.set('Range', rangeHeader(session.offset));
}

export function createV2Router(registry: RegistryService, pagination: PaginationConfig): Router {
  const router = Router();

  function setNextLink(res: Response, basePath: string, page: Page<string>, limit: number): void {
    const last = page.items[page.items.length - 1];
    if (page.hasMore && last !== undefined) {
      res.set('Link', buildPaginationLink(basePath, limit, last));
    }
  }

  async function handleBase(res: Response): Promise<void> {
    const body: ApiVersionResponse = { version: '2.0', name: 'layerhold-registry' };
    res.json(body);
  }

  async function handleCatalog(req: Request, res: Response): Promise<void> {
    const params = parsePaginationParams(queryParam(req, 'n'), queryParam(req, 'last'), pagination);
    const page = await registry.getCatalog(getSubject(req), params);
    setNextLink(res, '/v2/_catalog', page, params.limit);
    const body: CatalogResponse = { repositories: page.items };
    res.json(body);
  }

  async function handleTags(req: Request, res: Response, name: string): Promise<void> {
    const params = parsePaginationParams(queryParam(req, 'n'), queryParam(req, 'last'), pagination);
    const page = await registry.listTags(getSubject(req), name, params);
    setNextLink(res, `/v2/${name}/tags/list`, page, params.limit);
    const body: TagListResponse = { name, tags: page.items };
    res.json(body);
  }

  async function handleManifest(req: Request, res: Response, name: string, reference: string): Promise<void> {
    const subject = getSubject(req);

    if (req.method === 'GET' || req.method === 'HEAD') {
      const manifest = await registry.getManifest(subject, name, reference);
      res.set('Content-Type', manifest.mediaType);
      res.set('Docker-Content-Digest', manifest.digest);
      res.set('Content-Length', String(manifest.size));
      if (req.method === 'HEAD') {
        res.status(200).end();
        return;
      }
      res.status(200).end(manifest.content);
      return;
    }

    if (req.method === 'PUT') {
      const result = await registry.putManifest(subject, name, reference, bodyOf(req), req.get('content-type'));
      res.set('Docker-Content-Digest', result.digest);
      res.set('Location', `/v2/${name}/manifests/${result.digest}`);
      res.status(201).end();
      return;
    }

    if (req.method === 'DELETE') {
      await registry.deleteManifest(subject, name, reference);
      res.status(202).end();
      return;
    }

    unsupported(res);
  }

  async function handleBlob(req: Request, res: Response, name: string, digest: string): Promise<void> {
    const subject = getSubject(req);

    if (req.method === 'HEAD') {
      const blob = await registry.statBlob(subject, name, digest);
      res.set('Content-Length', String(blob.size));
      res.set('Content-Type', blob.mediaType);
      res.set('Docker-Content-Digest', blob.digest);
      res.status(200).end();
      return;
    }

    if (req.method === 'GET') {
      const { info, content } = await registry.getBlob(subject, name, digest);
      res.set('Content-Type', info.mediaType);
      res.set('Docker-Content-Digest', info.digest);
      res.set('Content-Length', String(content.length));
      res.status(200).end(content);
      return;
    }

    if (req.method === 'DELETE') {
      await registry.deleteBlob(subject, name, digest);
      res.status(202).end();
      return;
    }

    unsupported(res);
  }

  async function handleUploads(req: Request, res: Response, name: string): Promise<void> {
    if (req.method !== 'POST') {
      unsupported(res);
      return;
    }
    const subject = getSubject(req);
    const digest = queryParam(req, 'digest');

    // Monolithic upload: POST ?digest= with the whole blob as body
    if (digest) {
      const mediaType = req.get('content-type');
      const blob = await registry.uploadMonolithic(subject, name, bodyOf(req), digest, mediaType);
      res.set('Location', `/v2/${name}/blobs/${blob.digest}`);
      res.set('Docker-Content-Digest', blob.digest);
      res.status(201).end();
      return;
    }

    const session = await registry.startUpload(subject, name);
    setUploadHeaders(res, name, session);
    res.set('Content-Length', '0');
    res.status(202).end();
  }

  async function handleUpload(req: Request, res: Response, name: string, id: string): Promise<void> {
    const subject = getSubject(req);

    if (req.method === 'GET') {
      const session = await registry.uploadStatus(subject, name, id);
      setUploadHeaders(res, name, session);
      res.status(204).end();
      return;
    }

    if (req.method === 'PATCH') {
      const chunk = bodyOf(req);
      const contentRange = req.get('content-range');
      let start: number | undefined;
      if (contentRange) {
        const range = parseContentRange(contentRange);
        if (range.end - range.start + 1 !== chunk.length) {
          throw new SizeInvalidError(`Content-Range ${contentRange} does not match body length ${chunk.length}`);
        }
        start = range.start;
      }
      const offset = await registry.appendChunk(subject, name, id, chunk, start);
      setUploadHeaders(res, name, { id, offset });
      res.set('Content-Length', '0');
      res.status(202).end();
      return;
    }

    if (req.method === 'PUT') {
      const digest = queryParam(req, 'digest');
      if (!digest) {
        throw new SizeInvalidError('digest query parameter is required to complete an upload');
      }
      const mediaType = req.get('content-type');
      const blob = await registry.completeUpload(subject, name, id, bodyOf(req), digest, mediaType);
      res.set('Location', `/v2/${name}/blobs/${blob.digest}`);
      res.set('Docker-Content-Digest', blob.digest);
      res.set('Content-Length', '0');
      res.status(201).end();
      return;
    }

    if (req.method === 'DELETE') {
      await registry.cancelUpload(subject, name, id);
      res.status(204).end();
      return;
    }

    unsupported(res);
  }

  const READ_ONLY_ROUTES: ReadonlySet<V2Route['kind']> = new Set(['base', 'catalog', 'tags']);

  // Unified handler: repository names contain slashes, so routing is done on the raw path
  router.all('*', async (req: Request, res: Response, next: NextFunction) => {
    res.set(API_VERSION_HEADER, API_VERSION);
    const path = req.path.replace(/^\//, '');
    const route = parseV2Path(path);
    logger.debug({ method: req.method, path, route: route?.kind }, 'V2 request');

    try {
      if (!route) {
        res.status(404).json({ errors: [{ code: 'UNSUPPORTED', message: `unknown route /v2/${path}` }] });
        return;
      }
      if (READ_ONLY_ROUTES.has(route.kind) && req.method !== 'GET' && req.method !== 'HEAD') {
        unsupported(res);
        return;
      }
      switch (route.kind) {
        case 'base':
          return await handleBase(res);
        case 'catalog':
          return await handleCatalog(req, res);
        case 'tags':
          return await handleTags(req, res, route.name);
        case 'manifest':
          return await handleManifest(req, res, route.name, route.reference);
        case 'blob':
          return await handleBlob(req, res, route.name, route.digest);
        case 'uploads':
          return await handleUploads(req, res, route.name);
        case 'upload':
          return await handleUpload(req, res, route.name, route.id);
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}

function unsupported(res: Response): void {
  res.status(405).json({ errors: [{ code: 'UNSUPPORTED', message: 'method not allowed' }] });
}
