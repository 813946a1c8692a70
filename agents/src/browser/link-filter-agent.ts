/**
 * Link Filter Agent — picks the links worth offering to the navigation oracle.
 *
 * Only links on the same site (or on a known ATS board) whose text or href
 * carries a job marker are offered. Static, asset and auth paths never are.
 *
 * Code-only, no LLM. Deterministic and fast.
 */

import type { PageLink } from './html-cleanup-agent.js';

export interface JobLinkOptions {
  currentUrl: string;
  /** Normalized URLs already visited in this walk */
  visited: ReadonlySet<string>;
  limit?: number;
}

/** Lexical markers of job-related links, matched against lowercase text and href. */
export const JOB_LINK_MARKERS = [
  'job',
  'career',
  'intern',
  'oppor',
  'position',
  'opening',
  'vacanc',
  'hiring',
  'recruit',
  'join',
  'work-with',
  'workwith',
];

export const DEFAULT_LINK_LIMIT = 40;

/**
 * Paths that are definitely NOT job-related. Only block these exact prefixes.
 * We are permissive — if in doubt, let it through.
 */
const BLOCKLIST_EXACT_PREFIXES = [
  '/api/',
  '/static/',
  '/assets/',
  '/css/',
  '/js/',
  '/fonts/',
  '/images/',
  '/img/',
  '/media/',
  '/wp-content/',
  '/wp-admin/',
  '/feed/',
  '/rss/',
  '/.well-known/',
  '/cdn-cgi/',
  '/talent/_next/',
  '/_next/',
];

/**
 * Paths blocked only when they are the FULL path (not a subpath of something else).
 * e.g. /login is blocked, but /company/login-startup would NOT be.
 */
const BLOCKLIST_EXACT_PATHS = [
  '/login',
  '/signin',
  '/signup',
  '/register',
  '/auth',
  '/privacy',
  '/terms',
  '/robots.txt',
  '/sitemap.xml',
];

const EXTERNAL_ATS_DOMAINS = [
  'greenhouse.io',
  'lever.co',
  'workday.com',
  'icims.com',
  'smartrecruiters.com',
  'ashbyhq.com',
  'bamboohr.com',
  'breezy.hr',
  'recruitee.com',
  'workable.com',
  'jazz.co',
  'jobvite.com',
  'myworkdayjobs.com',
  'taleo.net',
  'successfactors.com',
];

/**
 * Normalize a URL for deduplication: strip fragment, sort query params,
 * remove trailing slash.
 */
export function normalizeUrl(rawUrl: string): string {
  try {
    const u = new URL(rawUrl);
    u.hash = '';
    u.searchParams.sort();
    let pathname = u.pathname;
    if (pathname.length > 1 && pathname.endsWith('/')) {
      pathname = pathname.slice(0, -1);
    }
    u.pathname = pathname;
    return u.toString();
  } catch {
    return rawUrl;
  }
}

/**
 * Check if a URL is an external ATS apply link.
 */
export function isExternalApplyUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return EXTERNAL_ATS_DOMAINS.some((d) => host.includes(d));
  } catch {
    return false;
  }
}

/**
 * Registrable part of a hostname, approximated: last two labels, or last
 * three for two-letter country domains with a short second level (co.uk).
 */
export function siteOf(hostname: string): string {
  const labels = hostname.toLowerCase().replace(/^www\./, '').split('.');
  if (labels.length <= 2) return labels.join('.');
  const tld = labels[labels.length - 1] ?? '';
  const second = labels[labels.length - 2] ?? '';
  const take = tld.length === 2 && second.length <= 3 ? 3 : 2;
  return labels.slice(-take).join('.');
}

export function isSameSite(a: string, b: string): boolean {
  try {
    return siteOf(new URL(a).hostname) === siteOf(new URL(b).hostname);
  } catch {
    return false;
  }
}

export function hasJobMarker(link: PageLink): boolean {
  const haystack = `${link.text} ${link.url}`.toLowerCase();
  return JOB_LINK_MARKERS.some((marker) => haystack.includes(marker));
}

function isBlockedPath(pathname: string): boolean {
  const pathLower = pathname.toLowerCase();

  // Skip static/asset prefixes
  if (BLOCKLIST_EXACT_PREFIXES.some((bp) => pathLower.startsWith(bp))) return true;

  // Skip exact auth/legal paths (but not subpaths like /company/login-startup)
  if (BLOCKLIST_EXACT_PATHS.some((bp) => pathLower === bp || pathLower === bp + '/')) return true;

  // Skip file extensions that aren't pages
  return /\.(js|css|png|jpg|jpeg|gif|svg|ico|woff|woff2|ttf|eot|map|json|xml|pdf|zip)$/i.test(
    pathLower,
  );
}

/**
 * Links to offer the oracle from the current page: same-site or ATS, carrying
 * a job marker, not yet visited, not the page itself. Order of appearance is
 * kept; the list is capped.
 */
export function selectJobLinks(links: readonly PageLink[], options: JobLinkOptions): PageLink[] {
  const limit = options.limit ?? DEFAULT_LINK_LIMIT;
  const current = normalizeUrl(options.currentUrl);
  const offered = new Set<string>();
  const result: PageLink[] = [];

  for (const link of links) {
    if (result.length >= limit) break;

    const normalized = normalizeUrl(link.url);
    if (normalized === current || offered.has(normalized) || options.visited.has(normalized)) {
      continue;
    }

    let parsed: URL;
    try {
      parsed = new URL(normalized);
    } catch {
      continue;
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') continue;

    if (!isSameSite(normalized, options.currentUrl) && !isExternalApplyUrl(normalized)) continue;
    if (isBlockedPath(parsed.pathname)) continue;
    if (!hasJobMarker(link)) continue;

    offered.add(normalized);
    result.push({ text: link.text, url: normalized });
  }

  return result;
}
