import '../../scripts/load-env';
import { createAgentLogger } from '@boardscout/core';
import {
  DrizzlePersistenceGateway,
  InMemoryPersistenceGateway,
  closeDb,
  getDb,
  type PersistenceGateway,
} from '@boardscout/db';
import { createReasoningGateway } from '@boardscout/llm';
import { SerpApiCandidateSearch, launchBrowserSession } from '@boardscout/agents';
import { AgentLogBuffer } from '@/lib/agent-logs';
import { loadConfig } from '@/lib/config';
import { JobOrchestrator } from '@/lib/orchestrator';
import { createScheduler } from '@/lib/scheduler';
import { createApp } from './app';

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  const logs = new AgentLogBuffer();
  const logger = createAgentLogger('Server', { sink: logs.sink });

  const persistence: PersistenceGateway = config.databaseUrl
    ? new DrizzlePersistenceGateway(getDb())
    : new InMemoryPersistenceGateway();

  const launchBrowser = () =>
    launchBrowserSession({ headless: config.headless, timeout: config.pageTimeoutMs });

  const orchestrator = new JobOrchestrator(
    {
      persistence,
      search: new SerpApiCandidateSearch({
        apiKey: config.serpApiKey,
        logger: logger.child('CandidateSearch'),
      }),
      launchBrowser,
      createGateway: (credentials, gatewayLogger) =>
        createReasoningGateway(
          { ...credentials, baseUrl: credentials.baseUrl ?? config.ollamaBaseUrl },
          { logger: gatewayLogger },
        ),
      logSink: logs.sink,
    },
    {
      maxConcurrent: config.maxConcurrentWorkflows,
      timeoutMs: config.workflowTimeoutMs,
      retentionMs: config.workflowRetentionMs,
      hopBudget: config.hopBudget,
      captureScreenshots: config.captureScreenshots,
      artifactDir: config.artifactDir,
      validation: { duplicateRatioThreshold: config.duplicateRatioThreshold },
    },
  );

  const scheduler = createScheduler(
    config.scrapeIntervalMs,
    { persistence, launchBrowser, logSink: logs.sink },
    { duplicateRatioThreshold: config.duplicateRatioThreshold, runRetentionDays: config.runRetentionDays },
  );
  scheduler.start();

  const app = createApp({
    orchestrator,
    persistence,
    logs,
    runScheduledPass: (only) => scheduler.runOnce(only),
  });

  const server = app.listen(config.port, () => {
    process.stdout.write(`boardscout running on port ${config.port}\n`);
    process.stdout.write(`persistence=${config.databaseUrl ? 'postgres' : 'in-memory'}\n`);
  });

  const shutdown = () => {
    scheduler.stop();
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          process.stderr.write(`shutdown_failed: ${String(error)}\n`);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

bootstrap().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  process.stderr.write(`bootstrap_failed: ${message}\n`);
  process.exit(1);
});
