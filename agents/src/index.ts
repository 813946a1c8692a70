/**
 * @boardscout/agents - scraper synthesis and execution
 *
 * - browser/   : Browser driver, HTML normalization, link filtering, navigation
 * - synthesis/ : Configuration synthesis, validation loop, scraper artifacts
 * - runtime/   : Generic scraper runtime
 * - search/    : Candidate URL search
 * - shared/    : Base agent and agent types
 */

export * from './shared/index.js';
export * from './browser/index.js';
export * from './synthesis/index.js';
export * from './runtime/index.js';
export * from './search/index.js';
