/**
 * Page Navigator Agent — walks from ranked candidate URLs to the page that
 * actually lists job postings.
 *
 * Responsibilities:
 * - Open each candidate in rank order and walk at most `hopBudget` pages from it
 * - Offer the oracle only job-marked links (see link-filter-agent)
 * - STAY ends the walk; LEAVE follows the named link; anything else backtracks
 *   to the next candidate
 * - Report exactly one hop event per page visited
 *
 * LLM Usage: NAVIGATE through the reasoning gateway
 */

import {
  NavigationExhaustedError,
  createAgentLogger,
  isEscalatingError,
  toErrorMessage,
  type AgentLogger,
} from '@boardscout/core';
import type { ReasoningGateway } from '@boardscout/llm';
import type { BrowserDriver } from './browser-session.js';
import { cleanHtml, type CleanupResult } from './html-cleanup-agent.js';
import { normalizeUrl, selectJobLinks } from './link-filter-agent.js';

export const DEFAULT_HOP_BUDGET = 5;

export type HopVerdict = 'STAY' | 'LEAVE' | 'BACKTRACK';

export interface HopEvent {
  /** 1-based hop number within the current candidate */
  hop: number;
  /** 0-based index of the candidate being walked */
  candidate: number;
  url: string;
  verdict: HopVerdict;
  message: string;
  /** base64 PNG of the page, when captures are enabled */
  image?: string;
}

export interface BoardLocation {
  boardUrl: string;
  candidateUrl: string;
  page: CleanupResult;
  /** Pages visited across all candidates, the board included */
  hops: number;
}

export interface NavigatorDeps {
  driver: BrowserDriver;
  oracle: ReasoningGateway;
  logger?: AgentLogger;
  onHop?: (event: HopEvent) => void | Promise<void>;
}

export interface NavigatorOptions {
  hopBudget?: number;
  captureScreenshots?: boolean;
  linkLimit?: number;
}

export async function locateJobBoard(
  candidates: readonly string[],
  deps: NavigatorDeps,
  options: NavigatorOptions = {},
): Promise<BoardLocation> {
  const hopBudget = options.hopBudget ?? DEFAULT_HOP_BUDGET;
  const logger = deps.logger ?? createAgentLogger('PageNavigator');
  const { driver, oracle } = deps;

  if (candidates.length === 0) {
    throw new NavigationExhaustedError('No candidate URLs to navigate from');
  }

  const visited = new Set<string>();
  let totalHops = 0;

  const report = async (event: Omit<HopEvent, 'image'>, capture: boolean) => {
    const image = capture && options.captureScreenshots ? await captureQuietly(driver, logger) : undefined;
    await deps.onHop?.(image ? { ...event, image } : event);
  };

  for (const [candidate, candidateUrl] of candidates.entries()) {
    let url = candidateUrl;
    logger.info(`Walking candidate ${candidate + 1}/${candidates.length}`, { url });

    for (let hop = 1; hop <= hopBudget; hop++) {
      totalHops++;
      visited.add(normalizeUrl(url));

      try {
        await driver.open(url);
      } catch (err) {
        if (isEscalatingError(err)) throw err;
        logger.warn(`Could not open ${url}`, toErrorMessage(err));
        await report(
          { hop, candidate, url, verdict: 'BACKTRACK', message: `Could not open page: ${toErrorMessage(err)}` },
          false,
        );
        break;
      }

      const landedUrl = driver.currentUrl() || url;
      visited.add(normalizeUrl(landedUrl));
      const page = cleanHtml(await driver.currentHtml(), landedUrl);
      const links = selectJobLinks(page.links, {
        currentUrl: landedUrl,
        visited,
        limit: options.linkLimit,
      });

      const verdict = await oracle.navigate({
        url: landedUrl,
        title: page.title,
        text: page.text,
        links,
      });

      if (!verdict.valid) {
        logger.warn('No viable link, backtracking', verdict.error);
        await report(
          { hop, candidate, url: landedUrl, verdict: 'BACKTRACK', message: `No viable link: ${verdict.error}` },
          true,
        );
        break;
      }

      const decision = verdict.value;
      if (decision.action === 'STAY') {
        logger.success(`Job board found at ${landedUrl}`);
        await report(
          {
            hop,
            candidate,
            url: landedUrl,
            verdict: 'STAY',
            message: decision.reason ? `Job board found: ${decision.reason}` : 'Job board found',
          },
          true,
        );
        return { boardUrl: landedUrl, candidateUrl, page, hops: totalHops };
      }

      if (hop === hopBudget) {
        await report(
          {
            hop,
            candidate,
            url: landedUrl,
            verdict: 'BACKTRACK',
            message: `Hop budget of ${hopBudget} spent on this candidate`,
          },
          true,
        );
        break;
      }

      await report(
        {
          hop,
          candidate,
          url: landedUrl,
          verdict: 'LEAVE',
          message: `Following ${decision.url}${decision.reason ? `: ${decision.reason}` : ''}`,
        },
        true,
      );
      url = decision.url;
    }
  }

  throw new NavigationExhaustedError(
    `No job board found after ${totalHops} hops across ${candidates.length} candidate URLs`,
  );
}

async function captureQuietly(driver: BrowserDriver, logger: AgentLogger): Promise<string | undefined> {
  try {
    return (await driver.screenshot()).toString('base64');
  } catch (err) {
    logger.debug('Screenshot failed', toErrorMessage(err));
    return undefined;
  }
}
