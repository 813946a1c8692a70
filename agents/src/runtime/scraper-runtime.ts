/**
 * Scraper Runtime — executes a ScrapingConfiguration against a live board.
 *
 * Responsibilities:
 * - Dismiss overlays, run the configured search interaction, then page
 * - Yield well-formed, keyword-matching records lazily, each url once
 * - Stop on: no next control, disabled/hidden control, empty page, repeated
 *   URLs, page or time budget, or (scheduled runs only) a page timeout
 * - Report why it stopped, and whether that looks like the end of the
 *   listings or like selector drift
 *
 * LLM Usage: None
 */

import {
  PageTimeoutError,
  RuntimeFailureError,
  createAgentLogger,
  isEscalatingError,
  toErrorMessage,
  type AgentLogger,
} from '@boardscout/core';
import type {
  JobRecord,
  ScrapingConfiguration,
  SearchInteraction,
  TerminationCategory,
  TerminationReason,
} from '@boardscout/schemas';
import type { BrowserDriver } from '../browser/browser-session.js';
import { assertExecutable } from './configuration.js';
import { extractListings } from './extract.js';
import { matchesKeywordFilter } from './keyword-filter.js';
import { dismissOverlays } from './overlays.js';

export type RuntimeMode = 'validation' | 'scheduled';

export const DEFAULT_MAX_PAGES = 50;
export const DEFAULT_DUPLICATE_RATIO_THRESHOLD = 0.5;

export interface RuntimeOptions {
  /** validation rethrows page timeouts; scheduled treats them as a stop reason */
  mode?: RuntimeMode;
  maxPages?: number;
  /** Share of a page's URLs already seen (this run or persisted) that ends paging */
  duplicateRatioThreshold?: number;
  /** URLs already persisted for the target; never yielded again */
  knownUrls?: Iterable<string>;
  timeBudgetMs?: number;
  targetId?: string | null;
  logger?: AgentLogger;
  now?: () => number;
}

export interface ScrapeTermination {
  reason: TerminationReason;
  category: TerminationCategory;
  pagesVisited: number;
  /** Items with a title and url, whether or not they were yielded */
  wellFormed: number;
  recordsYielded: number;
  droppedMalformed: number;
  droppedByFilter: number;
  detail?: string;
}

export interface CollectedScrape {
  records: JobRecord[];
  termination: ScrapeTermination;
}

export function categorizeTermination(
  reason: TerminationReason,
  stats: Pick<ScrapeTermination, 'pagesVisited' | 'wellFormed' | 'droppedMalformed'>,
): TerminationCategory {
  switch (reason) {
    case 'PAGE_TIMEOUT':
      return 'TIMEOUT';
    case 'PAGE_LIMIT':
    case 'TIME_BUDGET':
      return 'BUDGET';
    case 'EMPTY_PAGE':
      if (stats.pagesVisited <= 1) return 'SELECTOR_DRIFT';
      break;
    default:
      break;
  }
  // Known, repeated or filtered rows still prove the selectors match.
  if (stats.wellFormed === 0 && stats.droppedMalformed > 0) return 'SELECTOR_DRIFT';
  return 'NO_MORE_JOBS';
}

/**
 * One execution of a configuration. Iterable exactly once; `termination`
 * is set when iteration completes.
 */
export class ScrapeRun implements AsyncIterable<JobRecord> {
  private started = false;
  private result: ScrapeTermination | null = null;
  private readonly logger: AgentLogger;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly configuration: ScrapingConfiguration,
    private readonly boardUrl: string,
    private readonly options: RuntimeOptions = {},
  ) {
    this.logger = options.logger ?? createAgentLogger('ScraperRuntime');
  }

  get termination(): ScrapeTermination | null {
    return this.result;
  }

  [Symbol.asyncIterator](): AsyncIterator<JobRecord> {
    if (this.started) {
      throw new RuntimeFailureError('A scrape run can only be iterated once');
    }
    this.started = true;
    return this.execute();
  }

  private async *execute(): AsyncGenerator<JobRecord, void, undefined> {
    const { driver, configuration, boardUrl, logger } = this;
    const mode = this.options.mode ?? 'scheduled';
    const maxPages = Math.max(1, this.options.maxPages ?? DEFAULT_MAX_PAGES);
    const threshold = this.options.duplicateRatioThreshold ?? DEFAULT_DUPLICATE_RATIO_THRESHOLD;
    const now = this.options.now ?? Date.now;
    const startedAt = now();

    const seen = new Set<string>(this.options.knownUrls ?? []);
    const stats = {
      pagesVisited: 0,
      wellFormed: 0,
      recordsYielded: 0,
      droppedMalformed: 0,
      droppedByFilter: 0,
    };

    const finish = (reason: TerminationReason, detail?: string): void => {
      this.result = { reason, category: categorizeTermination(reason, stats), ...stats, detail };
      logger.info(`Stopped after ${stats.pagesVisited} page(s): ${reason}`, {
        records: stats.recordsYielded,
        detail,
      });
    };

    // Timeouts end scheduled runs quietly; everywhere else they are failures.
    const timedOut = (err: unknown): err is PageTimeoutError =>
      mode === 'scheduled' && err instanceof PageTimeoutError;

    try {
      await driver.open(boardUrl);
      await dismissOverlays(driver, logger);
      await performSearch(driver, configuration.search);
    } catch (err) {
      if (timedOut(err)) {
        finish('PAGE_TIMEOUT', err.message);
        return;
      }
      throw err;
    }

    for (let page = 1; ; page++) {
      if (page > 1) await dismissOverlays(driver, logger);
      stats.pagesVisited = page;

      const pageUrl = driver.currentUrl() || boardUrl;
      const extraction = extractListings(await driver.currentHtml(), pageUrl, configuration, {
        targetId: this.options.targetId ?? null,
        scrapedAt: new Date().toISOString(),
      });

      if (extraction.itemCount === 0) {
        finish('EMPTY_PAGE', `"${configuration.listItemSelector}" matched nothing on ${pageUrl}`);
        return;
      }
      stats.droppedMalformed += extraction.malformed;
      stats.wellFormed += extraction.candidates.length;

      const pageUrls = [...new Set(extraction.candidates.map((c) => c.url))];
      const repeated = pageUrls.filter((url) => seen.has(url)).length;
      const fresh = new Set(pageUrls.filter((url) => !seen.has(url)));
      for (const url of pageUrls) seen.add(url);

      for (const record of extraction.candidates) {
        if (!fresh.delete(record.url)) continue;
        if (!matchesKeywordFilter(record, configuration.keywordFilter)) {
          stats.droppedByFilter++;
          continue;
        }
        stats.recordsYielded++;
        yield record;
      }

      logger.debug(`Page ${page}: ${extraction.itemCount} items, ${repeated} already seen`);

      if (repeated > 0 && repeated / pageUrls.length >= threshold) {
        finish('DUPLICATE_RATIO', `${repeated} of ${pageUrls.length} URLs on page ${page} already seen`);
        return;
      }
      if (!configuration.paginationSelector || extraction.nextControl === 'absent') {
        finish('NO_NEXT_CONTROL');
        return;
      }
      if (extraction.nextControl === 'disabled') {
        finish('NEXT_CONTROL_DISABLED');
        return;
      }
      if (page >= maxPages) {
        finish('PAGE_LIMIT');
        return;
      }
      if (this.options.timeBudgetMs !== undefined && now() - startedAt >= this.options.timeBudgetMs) {
        finish('TIME_BUDGET');
        return;
      }

      try {
        await driver.click(configuration.paginationSelector);
      } catch (err) {
        if (isEscalatingError(err)) throw err;
        if (timedOut(err)) {
          finish('PAGE_TIMEOUT', err.message);
          return;
        }
        if (err instanceof PageTimeoutError) throw err;
        finish('NO_NEXT_CONTROL', `Next control could not be clicked: ${toErrorMessage(err)}`);
        return;
      }
    }
  }
}

async function performSearch(driver: BrowserDriver, search: SearchInteraction): Promise<void> {
  switch (search.mode) {
    case 'none':
      return;
    case 'button':
      await driver.click(search.selector);
      return;
    case 'query':
      await driver.fill(search.inputSelector, search.query);
      if (search.submitSelector) {
        await driver.click(search.submitSelector);
      } else {
        await driver.submit(search.inputSelector);
      }
      return;
  }
}

/**
 * Start a run. The configuration is checked before anything is navigated.
 */
export function runScraper(
  driver: BrowserDriver,
  configuration: ScrapingConfiguration,
  boardUrl: string,
  options?: RuntimeOptions,
): ScrapeRun {
  return new ScrapeRun(driver, assertExecutable(configuration), boardUrl, options);
}

/** Drain a run. */
export async function collectScrape(run: ScrapeRun): Promise<CollectedScrape> {
  const records: JobRecord[] = [];
  for await (const record of run) records.push(record);
  const termination = run.termination;
  if (!termination) throw new RuntimeFailureError('Scrape run ended without a termination reason');
  return { records, termination };
}
