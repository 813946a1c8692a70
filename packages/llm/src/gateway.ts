/**
 * Reasoning Gateway — the three oracle operations behind one interface.
 *
 * Responsibilities:
 * - RANK candidate URLs for a target
 * - NAVIGATE: STAY on the current page or LEAVE through one offered link
 * - SYNTHESIZE a flat scraping configuration, or a structured refusal
 *
 * Every answer is schema-checked. NAVIGATE and SYNTHESIZE return a tagged
 * verdict so malformed answers never throw; only oracle unavailability does,
 * after exponential backoff.
 *
 * LLM Usage: FAST (rank), GENERAL (navigate), CODE (synthesize)
 */

import { z } from 'zod';
import { withBackoff, createAgentLogger, type AgentLogger } from '@boardscout/core';
import type {
  OracleCredentials,
  ScrapingConfiguration,
  ScrapingConfigurationInput,
} from '@boardscout/schemas';
import { OllamaClient, complete, isRetryableOracleError } from './client.js';
import type { OllamaModelType } from './models.js';
import { executeTemplate, truncateForPrompt } from './prompts.js';
import { parseOracleAnswer } from './parse.js';
import {
  RANK_TEMPLATE,
  NAVIGATE_TEMPLATE,
  SYNTHESIZE_TEMPLATE,
  FEEDBACK_TEMPLATE,
} from './oracle-prompts.js';

export type OracleVerdict<T> =
  | { valid: true; value: T }
  | { valid: false; error: string; raw?: string };

export interface OracleLink {
  text: string;
  url: string;
}

export type NavigationDecision =
  | { action: 'STAY'; reason?: string }
  | { action: 'LEAVE'; url: string; reason?: string };

export interface NavigateRequest {
  url: string;
  title?: string;
  text: string;
  links: OracleLink[];
}

export interface SynthesisFeedback {
  attempt: number;
  error: string;
  previous?: ScrapingConfiguration;
}

export interface SynthesizeRequest {
  url: string;
  html: string;
  feedback?: SynthesisFeedback;
}

export type SynthesisAnswer =
  | { status: 'configuration'; input: ScrapingConfigurationInput }
  | { status: 'refused'; reason: string };

export interface ReasoningGateway {
  rank(candidates: string[], query: string): Promise<string[]>;
  navigate(request: NavigateRequest): Promise<OracleVerdict<NavigationDecision>>;
  synthesize(request: SynthesizeRequest): Promise<OracleVerdict<SynthesisAnswer>>;
}

const rankResponseSchema = z.object({
  ranked: z.array(z.coerce.number().int()),
});

const navigateResponseSchema = z.object({
  decision: z.preprocess(
    (v) => (typeof v === 'string' ? v.trim().toUpperCase() : v),
    z.enum(['STAY', 'LEAVE']),
  ),
  link: z.coerce.number().int().nullish(),
  reason: z.string().optional(),
});

const nullableSelector = z.string().nullish();

const synthesizeResponseSchema = z.union([
  z.object({
    status: z.literal('refused'),
    reason: z.string().min(1),
  }),
  z.object({
    status: z.literal('ok').optional(),
    list_item_selector: z.string(),
    title_selector: z.string(),
    url_selector: z.string(),
    description_selector: nullableSelector,
    location_selector: nullableSelector,
    posted_date_selector: nullableSelector,
    pagination_selector: nullableSelector,
    search_button_selector: nullableSelector,
    search_input_selector: nullableSelector,
    search_query: nullableSelector,
    search_submit_selector: nullableSelector,
    keyword_filter: z.union([z.string(), z.array(z.string())]).nullish(),
  }),
]);

export interface OllamaGatewayOptions {
  client?: OllamaClient;
  /** Overrides the model of every operation */
  model?: string;
  maxHtmlChars?: number;
  maxTextChars?: number;
  maxLinks?: number;
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: AgentLogger;
}

export const DEFAULT_MAX_HTML_CHARS = 120_000;

export class OllamaReasoningGateway implements ReasoningGateway {
  private readonly client: OllamaClient;
  private readonly logger: AgentLogger;

  constructor(private readonly options: OllamaGatewayOptions = {}) {
    this.client = options.client ?? new OllamaClient();
    this.logger = options.logger ?? createAgentLogger('ReasoningGateway');
  }

  async rank(candidates: string[], query: string): Promise<string[]> {
    if (candidates.length <= 1) return [...candidates];

    const { prompt, system } = executeTemplate(RANK_TEMPLATE, {
      query,
      candidates: candidates.map((url, i) => `${i + 1}. ${url}`).join('\n'),
    });
    const raw = await this.ask(prompt, system, 'FAST');
    const parsed = parseOracleAnswer(raw, rankResponseSchema);
    if (!parsed.success) {
      this.logger.warn('Unusable ranking, keeping search order', parsed.error);
      return [...candidates];
    }
    return orderByRanking(candidates, parsed.data.ranked);
  }

  async navigate(request: NavigateRequest): Promise<OracleVerdict<NavigationDecision>> {
    const maxLinks = this.options.maxLinks ?? 40;
    const links = request.links.slice(0, maxLinks);
    const { prompt, system } = executeTemplate(NAVIGATE_TEMPLATE, {
      url: request.url,
      title: request.title ?? '(none)',
      text: truncateForPrompt(request.text, this.options.maxTextChars ?? 6000),
      links: links.length
        ? links.map((l, i) => `${i + 1}. ${l.text || '(no text)'} -> ${l.url}`).join('\n')
        : '(no candidate links)',
    });
    const raw = await this.ask(prompt, system, 'GENERAL');
    return interpretNavigation(raw, links);
  }

  async synthesize(request: SynthesizeRequest): Promise<OracleVerdict<SynthesisAnswer>> {
    const feedback = request.feedback
      ? executeTemplate(FEEDBACK_TEMPLATE, {
          attempt: String(request.feedback.attempt),
          error: request.feedback.error,
          previous: request.feedback.previous
            ? JSON.stringify(request.feedback.previous, null, 2)
            : '(none)',
        }).prompt
      : '';
    const { prompt, system } = executeTemplate(SYNTHESIZE_TEMPLATE, {
      url: request.url,
      html: truncateForPrompt(request.html, this.options.maxHtmlChars ?? DEFAULT_MAX_HTML_CHARS),
      feedback,
    });
    const raw = await this.ask(prompt, system, 'CODE');
    return interpretSynthesis(raw);
  }

  private ask(prompt: string, system: string | undefined, modelType: OllamaModelType) {
    return withBackoff(
      () =>
        complete(this.client, prompt, modelType, {
          system,
          format: 'json',
          ...(this.options.model ? { model: this.options.model } : {}),
        }),
      {
        retries: this.options.retries ?? 4,
        baseDelayMs: this.options.baseDelayMs ?? 1000,
        maxDelayMs: this.options.maxDelayMs ?? 30000,
        sleep: this.options.sleep,
        shouldRetry: isRetryableOracleError,
        onRetry: (err, retry, delayMs) =>
          this.logger.warn(`Oracle unavailable, retry ${retry} in ${delayMs}ms`, err),
      },
    );
  }
}

/**
 * Oracle-ranked candidates first, then the rest in their original order.
 * Numbers outside the list are ignored.
 */
export function orderByRanking(candidates: string[], ranked: number[]): string[] {
  const ordered: string[] = [];
  for (const n of ranked) {
    const url = candidates[n - 1];
    if (url !== undefined && !ordered.includes(url)) ordered.push(url);
  }
  for (const url of candidates) {
    if (!ordered.includes(url)) ordered.push(url);
  }
  return ordered;
}

export function interpretNavigation(
  raw: string,
  links: OracleLink[],
): OracleVerdict<NavigationDecision> {
  const parsed = parseOracleAnswer(raw, navigateResponseSchema);
  if (!parsed.success) {
    return { valid: false, error: parsed.error, raw };
  }
  const { decision, link, reason } = parsed.data;
  if (decision === 'STAY') return { valid: true, value: { action: 'STAY', reason } };

  const target = link != null && link >= 1 ? links[link - 1] : undefined;
  if (!target) {
    return {
      valid: false,
      error: link ? `LEAVE named link ${link}, which was not offered` : 'LEAVE without a usable link',
      raw,
    };
  }
  return { valid: true, value: { action: 'LEAVE', url: target.url, reason } };
}

export function interpretSynthesis(raw: string): OracleVerdict<SynthesisAnswer> {
  const parsed = parseOracleAnswer(raw, synthesizeResponseSchema);
  if (!parsed.success) {
    return { valid: false, error: parsed.error, raw };
  }
  const answer = parsed.data;
  if (answer.status === 'refused') {
    return { valid: true, value: { status: 'refused', reason: answer.reason } };
  }
  return {
    valid: true,
    value: {
      status: 'configuration',
      input: {
        listItemSelector: answer.list_item_selector,
        titleSelector: answer.title_selector,
        urlSelector: answer.url_selector,
        descriptionSelector: answer.description_selector,
        locationSelector: answer.location_selector,
        postedDateSelector: answer.posted_date_selector,
        paginationSelector: answer.pagination_selector,
        searchButtonSelector: answer.search_button_selector,
        searchInputSelector: answer.search_input_selector,
        searchQuery: answer.search_query,
        searchSubmitSelector: answer.search_submit_selector,
        keywordFilter: answer.keyword_filter,
      },
    },
  };
}

/**
 * Gateway bound to one workflow's oracle credentials.
 */
export function createReasoningGateway(
  credentials: OracleCredentials,
  options: Omit<OllamaGatewayOptions, 'client' | 'model'> = {},
): ReasoningGateway {
  return new OllamaReasoningGateway({
    ...options,
    client: new OllamaClient({ baseUrl: credentials.baseUrl, apiKey: credentials.apiKey }),
    model: credentials.model,
  });
}
