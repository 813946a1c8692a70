import { Router } from 'express';
import { z } from 'zod';
import type { ScheduledRunSummary } from '@/lib/scheduler';
import { HttpError } from '../http-error';

const scheduledRunSchema = z
  .object({
    targets: z.array(z.string().min(1)).optional(),
  })
  .default({});

export type ScheduledPass = (only?: string[]) => Promise<ScheduledRunSummary | null>;

export const buildScheduledRunRoutes = (runPass: ScheduledPass): Router => {
  const router = Router();

  router.post('/', async (req, res, next) => {
    const parsed = scheduledRunSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        error: 'ValidationError',
        message: parsed.error.flatten(),
      });
      return;
    }

    try {
      const summary = await runPass(parsed.data.targets);
      if (!summary) {
        next(new HttpError(409, 'A scheduled pass is already running', 'Conflict'));
        return;
      }
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
