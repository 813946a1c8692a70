/**
 * Ollama model configuration loaded from environment variables.
 * A workflow may override the model through its oracle credentials.
 */

export const OllamaModels = {
  /** General purpose model for navigation verdicts */
  GENERAL: process.env.OLLAMA_MODEL_GENERAL ?? 'qwen2.5:14b-instruct-q4_K_M',

  /** Code model for selector synthesis */
  CODE: process.env.OLLAMA_MODEL_CODE ?? 'qwen2.5-coder:14b-instruct-q4_K_M',

  /** Fast model for ranking search results */
  FAST: process.env.OLLAMA_MODEL_FAST ?? 'llama3.1:8b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  GENERAL: {
    model: OllamaModels.GENERAL,
    temperature: 0.1,
    maxTokens: 1024,
    timeout: 120000,
  },
  CODE: {
    model: OllamaModels.CODE,
    temperature: 0.1,
    maxTokens: 2048,
    timeout: 180000, // up to 3 minutes for selector synthesis
  },
  FAST: {
    model: OllamaModels.FAST,
    temperature: 0.2,
    maxTokens: 1024,
    timeout: 60000,
  },
};
