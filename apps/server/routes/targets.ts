import { Router } from 'express';
import type { PersistenceGateway } from '@boardscout/db';
import { notFound } from '../http-error';

export const buildTargetRoutes = (persistence: PersistenceGateway): Router => {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      res.json({ items: await persistence.listTargetSummaries() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:name', async (req, res, next) => {
    try {
      const target = (await persistence.listTargetSummaries()).find((t) => t.name === req.params.name);
      if (!target) {
        next(notFound(`Target ${req.params.name} not found`));
        return;
      }
      const [jobs, stats] = await Promise.all([
        persistence.listJobsForTarget(target.id),
        persistence.getRunStats(target.id),
      ]);
      res.json({ target, jobs, stats });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
