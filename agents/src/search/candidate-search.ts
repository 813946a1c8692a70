/**
 * Candidate search — URLs that may lead to a target's job board.
 * - SerpApiCandidateSearch: Google results via SerpAPI when SERPAPI_KEY is set
 * - Without a key the list is empty; the workflow then relies on a known
 *   board URL or fails with NavigationExhausted
 * - Rate limits, server errors and network failures are retried with backoff,
 *   then surface as OracleUnavailableError
 */

import { z } from 'zod';
import {
  OracleUnavailableError,
  createAgentLogger,
  toErrorMessage,
  withBackoff,
  type AgentLogger,
  type BackoffOptions,
} from '@boardscout/core';
import { isRetryableOracleError } from '@boardscout/llm';

export interface SearchResult {
  url: string;
  title: string;
  snippet?: string;
}

export interface CandidateSearch {
  findCandidates(targetName: string): Promise<string[]>;
}

const SERPAPI_BASE = 'https://serpapi.com/search';
const DEFAULT_NUM = 10;
const REQUEST_TIMEOUT_MS = 15_000;

const serpApiResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
  error: z.string().optional(),
});

export function candidateQuery(targetName: string): string {
  return `${targetName.trim()} careers jobs`;
}

export type SearchRetryOptions = Partial<
  Pick<BackoffOptions, 'retries' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>
>;

export interface SearchOptions {
  apiKey?: string;
  num?: number;
  fetchImpl?: typeof fetch;
  logger?: AgentLogger;
  retry?: SearchRetryOptions;
}

/**
 * Run a single Google search via SerpAPI and return organic result links.
 * Returns [] without a key, on a rejected request (bad key, bad query) and
 * when there are no organic results.
 */
export async function searchWeb(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
  const apiKey = options.apiKey?.trim();
  const logger = options.logger ?? createAgentLogger('CandidateSearch');
  if (!apiKey) return [];

  const params = new URLSearchParams({
    engine: 'google',
    q: query.trim(),
    api_key: apiKey,
    num: String(options.num ?? DEFAULT_NUM),
  });
  const url = `${SERPAPI_BASE}?${params.toString()}`;
  const fetchImpl = options.fetchImpl ?? fetch;

  const body = await withBackoff(() => requestSearch(url, fetchImpl), {
    retries: options.retry?.retries ?? 3,
    baseDelayMs: options.retry?.baseDelayMs ?? 1000,
    maxDelayMs: options.retry?.maxDelayMs ?? 15_000,
    sleep: options.retry?.sleep,
    shouldRetry: isRetryableOracleError,
    onRetry: (err, retry, delayMs) =>
      logger.warn(`Search unavailable, retry ${retry} in ${delayMs}ms`, toErrorMessage(err)),
  });
  if (body.rejected) {
    logger.warn(`Search returned HTTP ${body.rejected}`);
    return [];
  }

  const parsed = serpApiResponseSchema.safeParse(body.json);
  if (!parsed.success) {
    logger.warn('Unexpected search response shape');
    return [];
  }
  if (parsed.data.error) {
    logger.warn('Search API error', parsed.data.error);
    return [];
  }

  const results: SearchResult[] = [];
  const seen = new Set<string>();

  for (const item of parsed.data.organic_results ?? []) {
    const link = item.link?.trim();
    if (!link || seen.has(link) || !isHttpUrl(link)) continue;
    seen.add(link);
    results.push({
      url: link,
      title: item.title?.trim() ?? '',
      snippet: item.snippet?.trim(),
    });
  }
  return results;
}

type SearchResponse = { rejected?: undefined; json: unknown } | { rejected: number; json?: undefined };

/** One request. Throws OracleUnavailableError for what is worth retrying. */
async function requestSearch(url: string, fetchImpl: typeof fetch): Promise<SearchResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
  try {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: 'GET',
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });
    } catch (err) {
      throw new OracleUnavailableError(`Search request failed: ${toErrorMessage(err)}`, { cause: err });
    }
    if (res.status === 429 || res.status >= 500) {
      throw new OracleUnavailableError(`Search returned HTTP ${res.status}`, { status: res.status });
    }
    if (!res.ok) return { rejected: res.status };

    try {
      return { json: await res.json() };
    } catch (err) {
      throw new OracleUnavailableError(`Search returned a body that is not JSON: ${toErrorMessage(err)}`, {
        cause: err,
        status: res.status,
      });
    }
  } finally {
    clearTimeout(timeout);
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export class SerpApiCandidateSearch implements CandidateSearch {
  constructor(private readonly options: SearchOptions = {}) {}

  async findCandidates(targetName: string): Promise<string[]> {
    const results = await searchWeb(candidateQuery(targetName), this.options);
    return results.map((r) => r.url);
  }
}
