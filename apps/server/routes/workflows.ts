import { Router, type Response } from 'express';
import { createWorkflowInputSchema, type ProgressEvent } from '@boardscout/schemas';
import type { JobOrchestrator } from '@/lib/orchestrator';
import { notFound } from '../http-error';

const KEEPALIVE_MS = 20_000;

export function createSSEMessage(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function sseEventName(event: ProgressEvent): 'progress' | 'complete' {
  return event.stage === 'COMPLETE' ? 'complete' : 'progress';
}

export const buildWorkflowRoutes = (orchestrator: JobOrchestrator): Router => {
  const router = Router();

  router.post('/', (req, res, next) => {
    const parsed = createWorkflowInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'ValidationError',
        message: parsed.error.flatten(),
      });
      return;
    }

    try {
      const workflowId = orchestrator.createWorkflow(parsed.data.targetName, parsed.data.oracle);
      res.status(202).json({ workflowId });
    } catch (error) {
      next(error);
    }
  });

  router.get('/', (_req, res) => {
    res.json({ items: orchestrator.listWorkflows().map(({ events: _events, ...rest }) => rest) });
  });

  router.get('/:workflowId', (req, res, next) => {
    const snapshot = orchestrator.getWorkflow(req.params.workflowId);
    if (!snapshot) {
      next(notFound(`Workflow ${req.params.workflowId} not found`));
      return;
    }
    res.json(snapshot);
  });

  router.get('/:workflowId/events', async (req, res, next) => {
    // Detaching stops the stream, never the workflow.
    const detach = new AbortController();
    const events = orchestrator.subscribe(req.params.workflowId, detach.signal);
    if (!events) {
      next(notFound(`Workflow ${req.params.workflowId} not found`));
      return;
    }

    openEventStream(res);
    const keepalive = setInterval(() => res.write(': keepalive\n\n'), KEEPALIVE_MS);
    res.on('close', () => {
      clearInterval(keepalive);
      detach.abort();
    });

    try {
      for await (const event of events) {
        if (detach.signal.aborted) break;
        res.write(createSSEMessage(sseEventName(event), event));
      }
    } catch (error) {
      res.write(createSSEMessage('error', { message: error instanceof Error ? error.message : String(error) }));
    } finally {
      clearInterval(keepalive);
      res.end();
    }
  });

  return router;
};

function openEventStream(res: Response): void {
  res.status(200);
  res.set({
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });
  res.flushHeaders();
}
