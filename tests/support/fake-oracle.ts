import type {
  NavigateRequest,
  NavigationDecision,
  OracleVerdict,
  ReasoningGateway,
  SynthesisAnswer,
  SynthesizeRequest,
} from '@boardscout/llm';
import type { ScrapingConfigurationInput } from '@boardscout/schemas';

export const rowConfiguration = (
  overrides: Partial<ScrapingConfigurationInput> = {},
): ScrapingConfigurationInput => ({
  listItemSelector: '.job-row',
  titleSelector: '.job-title',
  urlSelector: '.job-title',
  descriptionSelector: '.job-desc',
  locationSelector: '.job-location',
  ...overrides,
});

export const configurationAnswer = (
  overrides: Partial<ScrapingConfigurationInput> = {},
): OracleVerdict<SynthesisAnswer> => ({
  valid: true,
  value: { status: 'configuration', input: rowConfiguration(overrides) },
});

/**
 * Oracle stand-in. Navigation answers are looked up by page URL (STAY when
 * absent); synthesis answers are consumed in order, the last one repeating.
 */
export class ScriptedOracle implements ReasoningGateway {
  readonly navigateRequests: NavigateRequest[] = [];
  readonly synthesizeRequests: SynthesizeRequest[] = [];
  readonly rankCalls: Array<{ candidates: string[]; query: string }> = [];

  constructor(
    private readonly script: {
      navigate?: Record<string, OracleVerdict<NavigationDecision>>;
      synthesize?: Array<OracleVerdict<SynthesisAnswer>>;
      rank?: (candidates: string[]) => string[];
    } = {},
  ) {}

  async rank(candidates: string[], query: string): Promise<string[]> {
    this.rankCalls.push({ candidates, query });
    return this.script.rank ? this.script.rank(candidates) : [...candidates];
  }

  async navigate(request: NavigateRequest): Promise<OracleVerdict<NavigationDecision>> {
    this.navigateRequests.push(request);
    return this.script.navigate?.[request.url] ?? { valid: true, value: { action: 'STAY' } };
  }

  async synthesize(request: SynthesizeRequest): Promise<OracleVerdict<SynthesisAnswer>> {
    this.synthesizeRequests.push(request);
    const answers = this.script.synthesize ?? [configurationAnswer()];
    const answer = answers[Math.min(this.synthesizeRequests.length, answers.length) - 1];
    return answer ?? { valid: false, error: 'no scripted answer' };
  }
}
