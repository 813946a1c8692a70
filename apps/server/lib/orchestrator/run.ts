/**
 * Workflow stages. Each stage reports its progress through the context and
 * throws a ScraperError on failure; the orchestrator owns stage bookkeeping,
 * timeouts and the terminal event.
 */
import { ScraperError } from '@boardscout/core';
import {
  ConfigSynthesizerAgent,
  candidateQuery,
  locateJobBoard,
  runValidationLoop,
  writeScraperArtifact,
  type BoardLocation,
} from '@boardscout/agents';
import type { PublishedScraper, ValidatedBoard, WorkflowContext } from './types';

/** SEARCHING: known board URL first, then search results in oracle rank order. */
export async function searchCandidates(ctx: WorkflowContext): Promise<string[]> {
  const { persistence, search } = ctx.deps;
  ctx.report('SEARCHING', `Searching for ${ctx.targetName} job board candidates`);

  const known = await persistence.getTargetByName(ctx.targetName);
  const found = await search.findCandidates(ctx.targetName);
  const ranked = await ctx.oracle.rank(found, candidateQuery(ctx.targetName));

  const candidates = [...new Set([...(known?.boardUrl ? [known.boardUrl] : []), ...ranked])];
  ctx.logger.info(`${candidates.length} candidate URLs`, { known: Boolean(known?.boardUrl) });
  ctx.report('SEARCHING', `Found ${candidates.length} candidate URLs`, { data: { candidates } });
  return candidates;
}

/** ANALYZING: walk the candidates to the job board. */
export async function analyzeCandidates(
  ctx: WorkflowContext,
  candidates: string[],
): Promise<BoardLocation> {
  ctx.report('ANALYZING', 'Navigating to the job board');
  const driver = await ctx.browser();

  const location = await locateJobBoard(
    candidates,
    {
      driver,
      oracle: ctx.oracle,
      logger: ctx.logger.child('PageNavigator'),
      onHop: (hop) => {
        ctx.report('ANALYZING', hop.message, {
          image: hop.image,
          data: { hop: hop.hop, candidate: hop.candidate, url: hop.url, verdict: hop.verdict },
        });
      },
    },
    {
      hopBudget: ctx.options.hopBudget,
      captureScreenshots: ctx.options.captureScreenshots,
    },
  );

  ctx.update({ boardUrl: location.boardUrl });
  return location;
}

/** VALIDATING: synthesize and sample until a configuration yields jobs. */
export async function validateBoard(
  ctx: WorkflowContext,
  location: BoardLocation,
): Promise<ValidatedBoard> {
  ctx.report('VALIDATING', `Synthesizing a scraper for ${location.boardUrl}`);
  const driver = await ctx.browser();

  const outcome = await runValidationLoop(
    { boardUrl: location.boardUrl, html: location.page.html },
    {
      synthesizer: new ConfigSynthesizerAgent(ctx.oracle),
      driver,
      logger: ctx.logger,
      workflowId: ctx.workflowId,
      onTransition: (t) => {
        ctx.update({ attempts: t.attempt });
        ctx.report('VALIDATING', `Attempt ${t.attempt}: ${t.from} -> ${t.to}: ${t.message}`, {
          data: { attempt: t.attempt, from: t.from, to: t.to },
        });
      },
    },
    ctx.options.validation,
  );

  ctx.update({ attempts: outcome.attempts });
  if (!outcome.ok) {
    throw new ScraperError(
      outcome.kind,
      `No working configuration after ${outcome.attempts} attempts: ${outcome.error}`,
    );
  }

  return {
    boardUrl: location.boardUrl,
    configuration: outcome.configuration,
    records: outcome.records,
    attempts: outcome.attempts,
  };
}

/** GENERATING then STORING. */
export async function publishScraper(
  ctx: WorkflowContext,
  board: ValidatedBoard,
): Promise<PublishedScraper> {
  ctx.report('GENERATING', 'Writing scraper artifact');
  const artifactPath = await writeScraperArtifact(ctx.options.artifactDir, {
    targetName: ctx.targetName,
    boardUrl: board.boardUrl,
    configuration: board.configuration,
  });
  ctx.update({ artifactPath });
  ctx.report('GENERATING', `Scraper written to ${artifactPath}`, { data: { artifactPath } });

  ctx.report('STORING', `Storing ${board.records.length} jobs`);
  const { persistence } = ctx.deps;
  const target = await persistence.upsertTarget({
    name: ctx.targetName,
    boardUrl: board.boardUrl,
    configuration: board.configuration,
  });
  const result = await persistence.insertJobsBatch(
    target.id,
    board.records.map((record) => ({ ...record, targetId: target.id })),
  );
  await persistence.logRun({
    targetId: target.id,
    jobsFound: board.records.length,
    success: true,
    attempts: board.attempts,
  });

  ctx.update({ jobsFound: board.records.length });
  ctx.report('STORING', `${result.added} new jobs, ${result.duplicates} already stored`, {
    data: { ...result },
  });

  return {
    targetId: target.id,
    artifactPath,
    jobsFound: board.records.length,
    added: result.added,
    duplicates: result.duplicates,
  };
}
