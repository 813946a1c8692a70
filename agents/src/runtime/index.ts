/**
 * Scraper Runtime - executes synthesized configurations
 *
 * - runScraper / collectScrape: paged extraction with termination reporting
 * - extractListings: per-page extraction from an HTML snapshot
 * - dismissOverlays: cookie and consent banners
 */

export * from './configuration.js';
export * from './keyword-filter.js';
export * from './overlays.js';
export * from './extract.js';
export * from './scraper-runtime.js';
