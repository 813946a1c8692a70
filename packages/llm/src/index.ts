/**
 * @boardscout/llm - Ollama client and the reasoning gateway
 */

export {
  OllamaClient,
  isRetryableOracleError,
  type OllamaClientOptions,
  type OllamaChatRequest,
  type OllamaChatResponse,
} from './client.js';

export {
  OllamaReasoningGateway,
  createReasoningGateway,
  orderByRanking,
  interpretNavigation,
  interpretSynthesis,
  type ReasoningGateway,
  type OllamaGatewayOptions,
  type OracleVerdict,
  type NavigationDecision,
  type NavigateRequest,
  type SynthesizeRequest,
  type SynthesisAnswer,
} from './gateway.js';
