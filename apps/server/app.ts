import express from 'express';
import type { PersistenceGateway } from '@boardscout/db';
import type { AgentLogBuffer } from '@/lib/agent-logs';
import type { JobOrchestrator } from '@/lib/orchestrator';
import { HttpError } from './http-error';
import { buildJobRoutes } from './routes/jobs';
import { buildLogRoutes } from './routes/logs';
import { buildScheduledRunRoutes, type ScheduledPass } from './routes/scheduled-runs';
import { buildStatsRoutes } from './routes/stats';
import { buildTargetRoutes } from './routes/targets';
import { buildWorkflowRoutes } from './routes/workflows';

export interface AppServices {
  orchestrator: JobOrchestrator;
  persistence: PersistenceGateway;
  logs: AgentLogBuffer;
  runScheduledPass: ScheduledPass;
}

export const createApp = ({ orchestrator, persistence, logs, runScheduledPass }: AppServices) => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'boardscout',
      activeWorkflows: orchestrator.activeCount,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/workflows', buildWorkflowRoutes(orchestrator));
  app.use('/api/jobs', buildJobRoutes(persistence));
  app.use('/api/targets', buildTargetRoutes(persistence));
  app.use('/api/stats', buildStatsRoutes(persistence));
  app.use('/api/scheduled-runs', buildScheduledRunRoutes(runScheduledPass));
  app.use('/api/logs', buildLogRoutes(logs));

  app.use((_req, _res, next) => {
    next(new HttpError(404, 'Route not found', 'NotFound'));
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof HttpError) {
      res.status(error.statusCode).json({
        error: error.name,
        message: error.message,
      });
      return;
    }

    const message = error instanceof Error ? error.message : 'Unexpected server error';
    res.status(500).json({
      error: 'InternalServerError',
      message,
    });
  });

  return app;
};
