import { Router } from 'express';
import { jobSearchQuerySchema } from '@boardscout/schemas';
import type { PersistenceGateway } from '@boardscout/db';

export const buildJobRoutes = (persistence: PersistenceGateway): Router => {
  const router = Router();

  router.get('/search', async (req, res, next) => {
    const parsed = jobSearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: 'ValidationError',
        message: parsed.error.flatten(),
      });
      return;
    }

    try {
      const jobs = await persistence.searchJobs(parsed.data);
      res.json({ jobs, count: jobs.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
