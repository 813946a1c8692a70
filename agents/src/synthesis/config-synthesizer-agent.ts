/**
 * Config Synthesizer Agent — turns a job board's cleaned HTML into a
 * ScrapingConfiguration.
 *
 * Responsibilities:
 * - Ask the oracle for selectors, passing the previous attempt's failure
 * - Reject malformed answers, refusals and configurations that cannot be built
 *
 * Never touches the browser. Oracle unavailability is rethrown by BaseAgent.
 *
 * LLM Usage: SYNTHESIZE through the reasoning gateway
 */

import { z } from 'zod';
import { SynthesisRejectedError } from '@boardscout/core';
import type { ReasoningGateway } from '@boardscout/llm';
import { scrapingConfigurationSchema, type ScrapingConfiguration } from '@boardscout/schemas';
import { BaseAgent } from '../shared/base-agent.js';
import type { AgentConfig } from '../shared/types.js';
import { createScrapingConfiguration } from '../runtime/configuration.js';

const synthesisInputSchema = z.object({
  url: z.string().url(),
  html: z.string().min(1),
  feedback: z
    .object({
      attempt: z.number().int().positive(),
      error: z.string(),
      previous: scrapingConfigurationSchema.optional(),
    })
    .optional(),
});

export type SynthesisInput = z.infer<typeof synthesisInputSchema>;

export class ConfigSynthesizerAgent extends BaseAgent<SynthesisInput, ScrapingConfiguration> {
  config: AgentConfig = {
    name: 'ConfigSynthesizer',
    description: 'Synthesizes a scraping configuration from a job board page',
    version: '1.0.0',
  };

  inputSchema = synthesisInputSchema;
  outputSchema = scrapingConfigurationSchema;

  constructor(private readonly oracle: ReasoningGateway) {
    super();
  }

  protected async run(input: SynthesisInput): Promise<ScrapingConfiguration> {
    if (input.feedback) {
      this.info(`Retrying after attempt ${input.feedback.attempt}: ${input.feedback.error}`);
    }

    const verdict = await this.oracle.synthesize({
      url: input.url,
      html: input.html,
      feedback: input.feedback,
    });

    if (!verdict.valid) {
      throw new SynthesisRejectedError(`Malformed synthesis answer: ${verdict.error}`);
    }
    if (verdict.value.status === 'refused') {
      throw new SynthesisRejectedError(`Oracle refused to synthesize: ${verdict.value.reason}`);
    }

    const configuration = createScrapingConfiguration(verdict.value.input);
    this.debug('Configuration synthesized', {
      listItemSelector: configuration.listItemSelector,
      search: configuration.search.mode,
      paginated: Boolean(configuration.paginationSelector),
    });
    return configuration;
  }
}
