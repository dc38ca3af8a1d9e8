/**
 * Repositories API routes for registry management
 */

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { getSubject } from '../middleware';
import { RegistryService } from '../services/registry';
import { RepositoryListResponse } from '../types/registry';

const createRepositorySchema = z.object({
  name: z.string().min(1),
});

export function createRepositoriesRouter(registry: RegistryService): Router {
  const router = Router();

  // GET /api/v1/registry/repositories - List repositories with tag counts
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summaries = await registry.listRepositories(getSubject(req));
      const body: RepositoryListResponse = {
        repositories: summaries.map((summary) => ({
          name: summary.name,
          tagCount: summary.tagCount,
          manifestCount: summary.manifestCount,
          createdAt: summary.createdAt.toISOString(),
        })),
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/registry/repositories/:name - Repository tags
  router.get('/:name(*)', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const name = req.params.name;
      const page = await registry.listTags(getSubject(req), name);
      res.json({ name, tags: page.items });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/registry/repositories - Create repository
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = createRepositorySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          errors: [{ code: 'NAME_INVALID', message: 'request body must be {"name": string}' }],
        });
        return;
      }
      const created = await registry.createRepository(getSubject(req), parsed.data.name);
      res.status(created ? 201 : 200).json({ name: parsed.data.name, created });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/registry/repositories/:name - Delete repository and everything in it
  router.delete('/:name(*)', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const name = req.params.name;
      const removed = await registry.deleteRepository(getSubject(req), name);
      res.json({ message: `Repository ${name} deleted`, removedDigests: removed });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
