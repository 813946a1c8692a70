/**
 * Synthesis - configuration synthesis and validation
 *
 * - ConfigSynthesizerAgent: oracle answer -> ScrapingConfiguration
 * - runValidationLoop: synthesize, sample, retry with feedback (max 3 attempts)
 * - Scraper artifacts on disk
 */

export * from './config-synthesizer-agent.js';
export * from './validation-loop.js';
export * from './artifact.js';
