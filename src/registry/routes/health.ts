/**
 * Health and cache maintenance routes
 */

import { NextFunction, Request, Response, Router } from 'express';
import { RegistryService } from '../services/registry';

export function createHealthRouter(registry: RegistryService): Router {
  const router = Router();

  // GET /health - storage and cache reachability
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const health = await registry.checkHealth();
      res.status(health.status === 'unhealthy' ? 503 : 200).json({ ...health, module: 'registry' });
    } catch (error) {
      next(error);
    }
  });

  // GET /health/cache - cache statistics
  router.get('/cache', (req: Request, res: Response) => {
    res.json({ cache_stats: registry.cacheStats() });
  });

  // DELETE /health/cache - drop every cached entry
  router.delete('/cache', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await registry.clearCache();
      res.json({ message: 'Cache cleared' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
