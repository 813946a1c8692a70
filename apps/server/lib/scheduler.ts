/**
 * Scheduled runner: re-executes every stored scraper against its board.
 *
 * Each target gets its own browser session and is isolated from the others:
 * a crash, timeout or selector drift is recorded against that target and the
 * pass moves on.
 */
import {
  createAgentLogger,
  toErrorMessage,
  type AgentLogger,
  type LogSink,
} from '@boardscout/core';
import { DEFAULT_RUN_RETENTION_DAYS, type PersistenceGateway } from '@boardscout/db';
import {
  collectScrape,
  runScraper,
  type BrowserDriver,
  type ScrapeTermination,
} from '@boardscout/agents';
import type { Target } from '@boardscout/schemas';

export interface ScheduledRunDeps {
  persistence: PersistenceGateway;
  launchBrowser: () => Promise<BrowserDriver>;
  logSink?: LogSink;
}

export interface ScheduledRunOptions {
  maxPages?: number;
  duplicateRatioThreshold?: number;
  /** Restrict the pass to these target names */
  only?: readonly string[];
  /** Run logs older than this are pruned after the pass */
  runRetentionDays?: number;
}

export interface TargetRunResult {
  targetId: string;
  targetName: string;
  success: boolean;
  jobsFound: number;
  added: number;
  duplicates: number;
  termination?: ScrapeTermination;
  error?: string;
}

export interface ScheduledRunSummary {
  startedAt: string;
  finishedAt: string;
  targets: number;
  succeeded: number;
  failed: number;
  jobsAdded: number;
  runsPruned: number;
  results: TargetRunResult[];
}

export async function runScheduledScrapes(
  deps: ScheduledRunDeps,
  options: ScheduledRunOptions = {},
): Promise<ScheduledRunSummary> {
  const startedAt = new Date().toISOString();
  const logger = createAgentLogger('Scheduler', { sink: deps.logSink });

  const targets = (await deps.persistence.listActiveTargets()).filter(
    (t) => !options.only || options.only.includes(t.name),
  );
  logger.info(`Scheduled pass over ${targets.length} targets`);

  const results: TargetRunResult[] = [];
  for (const target of targets) {
    results.push(await runTarget(target, deps, options, logger.child(`Scheduler:${target.name}`)));
  }

  const runsPruned = await pruneOldRuns(deps.persistence, options.runRetentionDays, logger);
  const succeeded = results.filter((r) => r.success).length;
  const summary: ScheduledRunSummary = {
    startedAt,
    finishedAt: new Date().toISOString(),
    targets: results.length,
    succeeded,
    failed: results.length - succeeded,
    jobsAdded: results.reduce((sum, r) => sum + r.added, 0),
    runsPruned,
    results,
  };
  logger.success(`Scheduled pass done: ${succeeded}/${results.length} targets succeeded`, {
    jobsAdded: summary.jobsAdded,
  });
  return summary;
}

async function runTarget(
  target: Target,
  deps: ScheduledRunDeps,
  options: ScheduledRunOptions,
  logger: AgentLogger,
): Promise<TargetRunResult> {
  const { persistence } = deps;
  const base = { targetId: target.id, targetName: target.name };

  if (!target.boardUrl || !target.configuration) {
    return { ...base, success: false, jobsFound: 0, added: 0, duplicates: 0, error: 'Target has no scraper' };
  }

  let driver: BrowserDriver | undefined;
  let runLogged = false;
  try {
    driver = await deps.launchBrowser();
    const knownUrls = await persistence.getExistingUrls(target.id);
    const { records, termination } = await collectScrape(
      runScraper(driver, target.configuration, target.boardUrl, {
        mode: 'scheduled',
        knownUrls,
        targetId: target.id,
        maxPages: options.maxPages,
        duplicateRatioThreshold: options.duplicateRatioThreshold,
        logger,
      }),
    );

    const insert = await persistence.insertJobsBatch(target.id, records);
    const drifted = termination.category === 'SELECTOR_DRIFT';
    const error = drifted
      ? `Selectors no longer match (${termination.reason}${termination.detail ? `: ${termination.detail}` : ''})`
      : undefined;

    await persistence.logRun({
      targetId: target.id,
      jobsFound: records.length,
      success: !drifted,
      errorMessage: error,
    });
    runLogged = true;
    await persistence.setTargetStatus(target.id, drifted ? 'BROKEN' : 'ACTIVE');

    if (drifted) logger.warn(`${target.name}: marked BROKEN`, error);
    else logger.info(`${target.name}: ${insert.added} new of ${records.length} jobs`, termination.reason);

    return {
      ...base,
      success: !drifted,
      jobsFound: records.length,
      added: insert.added,
      duplicates: insert.duplicates,
      termination,
      error,
    };
  } catch (err) {
    const error = `RuntimeFailure: ${toErrorMessage(err)}`;
    logger.error(`${target.name}: run failed`, error);
    if (!runLogged) await recordFailure(persistence, target.id, error, logger);
    return { ...base, success: false, jobsFound: 0, added: 0, duplicates: 0, error };
  } finally {
    await driver?.close().catch((err: unknown) => {
      logger.warn('Browser did not close cleanly', toErrorMessage(err));
    });
  }
}

async function recordFailure(
  persistence: PersistenceGateway,
  targetId: string,
  error: string,
  logger: AgentLogger,
): Promise<void> {
  try {
    await persistence.logRun({ targetId, jobsFound: 0, success: false, errorMessage: error });
  } catch (err) {
    logger.error('Could not log failed run', toErrorMessage(err));
  }
}

async function pruneOldRuns(
  persistence: PersistenceGateway,
  retentionDays = DEFAULT_RUN_RETENTION_DAYS,
  logger: AgentLogger,
): Promise<number> {
  try {
    const pruned = await persistence.pruneRuns(retentionDays);
    if (pruned > 0) logger.info(`Pruned ${pruned} run logs older than ${retentionDays} days`);
    return pruned;
  } catch (err) {
    logger.warn('Could not prune old run logs', toErrorMessage(err));
    return 0;
  }
}

export interface Scheduler {
  start(): void;
  stop(): void;
  /** One pass now, optionally over some targets; null if a pass is already running. */
  runOnce(only?: readonly string[]): Promise<ScheduledRunSummary | null>;
}

export function createScheduler(
  intervalMs: number,
  deps: ScheduledRunDeps,
  options: ScheduledRunOptions = {},
): Scheduler {
  const logger = createAgentLogger('Scheduler', { sink: deps.logSink });
  let timer: ReturnType<typeof setInterval> | undefined;
  let running = false;

  const runOnce = async (only?: readonly string[]): Promise<ScheduledRunSummary | null> => {
    if (running) {
      logger.warn('Previous pass still running, skipping');
      return null;
    }
    running = true;
    try {
      return await runScheduledScrapes(deps, only?.length ? { ...options, only } : options);
    } finally {
      running = false;
    }
  };

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        runOnce().catch((err: unknown) => logger.error('Scheduled pass failed', toErrorMessage(err)));
      }, intervalMs);
      timer.unref();
      logger.info(`Scheduler started, every ${Math.round(intervalMs / 60_000)} min`);
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = undefined;
    },
    runOnce,
  };
}
