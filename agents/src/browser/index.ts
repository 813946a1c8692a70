/**
 * Browser Agents - page access, normalization and navigation
 *
 * - PlaywrightBrowserSession: Playwright driver behind BrowserDriver
 * - cleanHtml: deterministic normalization (strip chrome, keep selectors and links)
 * - selectJobLinks: job-focused link filtering for the navigator
 * - locateJobBoard: oracle-guided walk from candidate URLs to the job board
 */

export * from './browser-session.js';
export * from './html-cleanup-agent.js';
export * from './link-filter-agent.js';
export * from './page-navigator-agent.js';
