/**
 * Validation & Retry Loop — synthesize, run a small sample, judge it, and
 * feed the failure into the next attempt.
 *
 *   SYNTHESIZE -> EXECUTE_SAMPLE -> EVALUATE -> SUCCESS
 *        ^                                  \-> RETRY -> SYNTHESIZE
 *        any step failing on the last attempt -> FAILURE
 *
 * Attempt failures stay inside the loop until attempts run out. Oracle
 * unavailability and workflow timeouts escape it.
 *
 * LLM Usage: SYNTHESIZE (via ConfigSynthesizerAgent)
 */

import {
  createAgentLogger,
  isEscalatingError,
  toErrorMessage,
  type AgentLogger,
} from '@boardscout/core';
import type { FailureKind, JobRecord, ScrapingConfiguration } from '@boardscout/schemas';
import type { BrowserDriver } from '../browser/browser-session.js';
import { deepFreeze } from '../runtime/configuration.js';
import { collectScrape, runScraper, type ScrapeTermination } from '../runtime/scraper-runtime.js';
import type { AgentResult } from '../shared/types.js';
import type { SynthesisInput } from './config-synthesizer-agent.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_SAMPLE_PAGES = 2;
export const DEFAULT_SAMPLE_TIME_BUDGET_MS = 60_000;
export const EMPTY_SAMPLE_FEEDBACK = '0 jobs extracted';

export type ValidationStateName =
  | 'SYNTHESIZE'
  | 'EXECUTE_SAMPLE'
  | 'EVALUATE'
  | 'RETRY'
  | 'SUCCESS'
  | 'FAILURE';

type SynthesisFeedback = NonNullable<SynthesisInput['feedback']>;

interface Sample {
  records: JobRecord[];
  termination: ScrapeTermination;
}

type LoopState =
  | { name: 'SYNTHESIZE'; attempt: number; feedback?: SynthesisFeedback }
  | { name: 'EXECUTE_SAMPLE'; attempt: number; configuration: ScrapingConfiguration }
  | { name: 'EVALUATE'; attempt: number; configuration: ScrapingConfiguration; sample: Sample }
  | {
      name: 'RETRY';
      attempt: number;
      error: string;
      kind: FailureKind;
      configuration?: ScrapingConfiguration;
    }
  | { name: 'SUCCESS'; attempt: number; configuration: ScrapingConfiguration; sample: Sample }
  | { name: 'FAILURE'; attempt: number; error: string; kind: FailureKind };

export interface ValidationTransition {
  from: ValidationStateName;
  to: ValidationStateName;
  attempt: number;
  message: string;
}

/** The part of ConfigSynthesizerAgent the loop depends on. */
export interface Synthesizer {
  execute(
    input: SynthesisInput,
    context?: { logger?: AgentLogger; workflowId?: string },
  ): Promise<AgentResult<ScrapingConfiguration>>;
}

export interface ValidationLoopDeps {
  synthesizer: Synthesizer;
  driver: BrowserDriver;
  logger?: AgentLogger;
  workflowId?: string;
  onTransition?: (transition: ValidationTransition) => void | Promise<void>;
}

export interface ValidationLoopOptions {
  maxAttempts?: number;
  samplePages?: number;
  sampleTimeBudgetMs?: number;
  duplicateRatioThreshold?: number;
}

export interface ValidationRequest {
  boardUrl: string;
  /** Cleaned HTML of the board page */
  html: string;
}

export type ValidationOutcome =
  | {
      ok: true;
      configuration: Readonly<ScrapingConfiguration>;
      records: JobRecord[];
      termination: ScrapeTermination;
      attempts: number;
    }
  | { ok: false; error: string; kind: FailureKind; attempts: number };

export async function runValidationLoop(
  request: ValidationRequest,
  deps: ValidationLoopDeps,
  options: ValidationLoopOptions = {},
): Promise<ValidationOutcome> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const logger = deps.logger ?? createAgentLogger('ValidationLoop');

  let state: LoopState = { name: 'SYNTHESIZE', attempt: 1 };

  const move = async (from: LoopState, next: LoopState, message: string): Promise<LoopState> => {
    logger.debug(`${from.name} -> ${next.name} (attempt ${next.attempt})`, message);
    await deps.onTransition?.({ from: from.name, to: next.name, attempt: next.attempt, message });
    return next;
  };

  // A failed step retries while attempts remain, otherwise it ends the loop.
  const fail = (
    attempt: number,
    error: string,
    kind: FailureKind,
    configuration?: ScrapingConfiguration,
  ): LoopState =>
    attempt < maxAttempts
      ? { name: 'RETRY', attempt, error, kind, configuration }
      : { name: 'FAILURE', attempt, error, kind };

  for (;;) {
    const current: LoopState = state;
    switch (current.name) {
      case 'SYNTHESIZE': {
        const result = await deps.synthesizer.execute(
          { url: request.boardUrl, html: request.html, feedback: current.feedback },
          { logger, workflowId: deps.workflowId },
        );
        if (!result.success || !result.data) {
          const error = result.error ?? 'Synthesis failed';
          state = await move(
            current,
            fail(current.attempt, error, result.errorKind ?? 'SynthesisRejected'),
            error,
          );
          break;
        }
        state = await move(
          current,
          { name: 'EXECUTE_SAMPLE', attempt: current.attempt, configuration: result.data },
          `Configuration synthesized on attempt ${current.attempt}`,
        );
        break;
      }

      case 'EXECUTE_SAMPLE': {
        let next: LoopState;
        let message: string;
        try {
          const sample = await collectScrape(
            runScraper(deps.driver, current.configuration, request.boardUrl, {
              mode: 'validation',
              maxPages: options.samplePages ?? DEFAULT_SAMPLE_PAGES,
              timeBudgetMs: options.sampleTimeBudgetMs ?? DEFAULT_SAMPLE_TIME_BUDGET_MS,
              duplicateRatioThreshold: options.duplicateRatioThreshold,
              logger: logger.child('ScraperRuntime'),
            }),
          );
          next = { name: 'EVALUATE', attempt: current.attempt, configuration: current.configuration, sample };
          message = `Sample run extracted ${sample.records.length} jobs`;
        } catch (err) {
          if (isEscalatingError(err)) throw err;
          message = toErrorMessage(err);
          next = fail(current.attempt, message, 'ExtractionFailure', current.configuration);
        }
        state = await move(current, next, message);
        break;
      }

      case 'EVALUATE': {
        if (current.sample.records.length > 0) {
          state = await move(
            current,
            { ...current, name: 'SUCCESS' },
            `${current.sample.records.length} jobs extracted`,
          );
        } else {
          state = await move(
            current,
            fail(current.attempt, EMPTY_SAMPLE_FEEDBACK, 'ExtractionFailure', current.configuration),
            EMPTY_SAMPLE_FEEDBACK,
          );
        }
        break;
      }

      case 'RETRY': {
        const feedback: SynthesisFeedback = {
          attempt: current.attempt,
          error: current.error,
          previous: current.configuration,
        };
        state = await move(
          current,
          { name: 'SYNTHESIZE', attempt: current.attempt + 1, feedback },
          `Retrying after: ${current.error}`,
        );
        break;
      }

      case 'SUCCESS':
        logger.success(`Configuration validated on attempt ${current.attempt}`);
        return {
          ok: true,
          configuration: deepFreeze(current.configuration),
          records: current.sample.records,
          termination: current.sample.termination,
          attempts: current.attempt,
        };

      case 'FAILURE':
        logger.warn(`Validation failed after ${current.attempt} attempts`, current.error);
        return { ok: false, error: current.error, kind: current.kind, attempts: current.attempt };
    }
  }
}
