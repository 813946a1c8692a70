import { Router } from 'express';
import type { AgentLogBuffer } from '@/lib/agent-logs';

export const buildLogRoutes = (logs: AgentLogBuffer): Router => {
  const router = Router();

  router.get('/', (req, res) => {
    const after = typeof req.query.after === 'string' ? req.query.after : undefined;
    res.json({ items: logs.list(after) });
  });

  return router;
};
