import { Router } from 'express';
import type { PersistenceGateway } from '@boardscout/db';

export const buildStatsRoutes = (persistence: PersistenceGateway): Router => {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      res.json(await persistence.getDashboardStats());
    } catch (error) {
      next(error);
    }
  });

  return router;
};
