/**
 * Ollama HTTP client for LLM inference.
 * Non-streaming chat completions; an optional bearer key supports hosted,
 * Ollama-compatible endpoints. Transport and HTTP failures surface as
 * OracleUnavailableError.
 */

import { z } from 'zod';
import { OracleUnavailableError, toErrorMessage } from '@boardscout/core';
import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const chatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

export type OllamaChatResponse = z.infer<typeof chatResponseSchema>;

export interface OllamaClientOptions {
  baseUrl?: string;
  apiKey?: string;
  defaultTimeout?: number;
  fetchImpl?: typeof fetch;
}

export class OllamaClient {
  private baseUrl: string;
  private apiKey?: string;
  private defaultTimeout: number;
  private fetchImpl: typeof fetch;

  constructor(options: OllamaClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? OLLAMA_BASE_URL).replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.defaultTimeout = options.defaultTimeout ?? 300000; // 5 minutes default for LLM operations
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  /**
   * Chat completion using the /api/chat endpoint.
   */
  async chat(request: OllamaChatRequest, timeout?: number): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify({ ...request, stream: false }),
          signal: controller.signal,
        });
      } catch (err) {
        throw new OracleUnavailableError(
          `Ollama unreachable at ${this.baseUrl}: ${toErrorMessage(err)}`,
          { cause: err },
        );
      }

      if (!response.ok) {
        const error = await response.text();
        throw new OracleUnavailableError(
          `Ollama chat failed: ${response.status} - ${error.slice(0, 300)}`,
          { status: response.status },
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new OracleUnavailableError('Ollama chat returned a body that is not JSON', {
          cause: err,
          status: response.status,
        });
      }
      const parsed = chatResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new OracleUnavailableError('Ollama chat returned an unexpected payload', {
          status: response.status,
        });
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * True for oracle failures worth waiting out: rate limits, server errors and
 * unreachable hosts. Authentication and bad-request failures are not retried.
 */
export function isRetryableOracleError(err: unknown): boolean {
  if (!(err instanceof OracleUnavailableError)) return false;
  return err.status === undefined || err.status === 429 || err.status >= 500;
}

/**
 * High-level completion function with model type selection.
 */
export async function complete(
  client: OllamaClient,
  prompt: string,
  modelType: OllamaModelType = 'GENERAL',
  options?: Partial<ModelConfig> & { system?: string; format?: 'json' },
): Promise<string> {
  const config = { ...defaultModelConfigs[modelType], ...options };

  const messages: OllamaChatMessage[] = [];

  if (options?.system) {
    messages.push({ role: 'system', content: options.system });
  }

  messages.push({ role: 'user', content: prompt });

  const response = await client.chat(
    {
      model: config.model,
      messages,
      format: options?.format,
      options: {
        temperature: config.temperature,
        top_p: config.topP,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
  );

  return response.message.content;
}
