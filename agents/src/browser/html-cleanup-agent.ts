/**
 * HTML Cleanup Agent — deterministic normalization of a rendered page.
 *
 * Goal: a condensed document the oracle can write selectors against. Unlike
 * a text-only cleanup, class, id and href survive, because synthesized
 * selectors depend on them.
 *
 * Removes: scripts, styles, SVGs, media, embeds, comments, page chrome
 * (header/footer/nav/aside) unless it holds pagination, and noise attributes.
 * Keeps: listing structure, form controls (search boxes, next buttons),
 * the link graph of the whole page (chrome links included, since careers
 * links often live in footers) and iframe sources (embedded ATS boards).
 *
 * LLM Usage: None
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { collapseWhitespace } from '@boardscout/core';

export interface PageLink {
  text: string;
  url: string;
}

export interface CleanupResult {
  html: string;
  /** Visible text, one collapsed line per block */
  text: string;
  title?: string;
  links: PageLink[];
  originalSize: number;
  cleanedSize: number;
  elementsRemoved: number;
}

// Tags to remove entirely (no content needed for selector synthesis)
const REMOVE_TAGS = new Set([
  'script',
  'noscript',
  'style',
  'template',
  'svg',
  'canvas',
  'object',
  'embed',
  'applet',
  'img',
  'picture',
  'source',
  'video',
  'audio',
  'link',
  'meta',
  'head',
]);

// Page chrome, dropped unless it carries pagination controls
const CHROME_TAGS = new Set(['header', 'footer', 'nav', 'aside']);

const KEEP_ATTRIBUTES = new Set([
  'class',
  'id',
  'href',
  'src',
  'name',
  'type',
  'placeholder',
  'role',
  'rel',
  'title',
  'disabled',
  'hidden',
  'aria-label',
  'aria-disabled',
]);

const PAGINATION_MARKER = /paginat|pager|next|prev|page-?link/i;

/**
 * Clean raw HTML to a condensed document plus its text and links.
 */
export function cleanHtml(rawHtml: string, sourceUrl?: string): CleanupResult {
  const originalSize = rawHtml.length;
  let elementsRemoved = 0;

  const root = parse(rawHtml, {
    comment: false,
    blockTextElements: {
      script: false,
      noscript: false,
      style: false,
    },
  });

  const title = collapseWhitespace(root.querySelector('title')?.text ?? '') || undefined;
  const links = collectLinks(root, sourceUrl);

  const toRemove: HTMLElement[] = [];

  function walk(node: HTMLElement): void {
    for (const child of node.childNodes) {
      if (!isElement(child)) continue;
      const tag = child.tagName.toLowerCase();

      if (REMOVE_TAGS.has(tag) || (CHROME_TAGS.has(tag) && !hasPaginationMarkup(child))) {
        toRemove.push(child);
        continue;
      }

      stripNoiseAttributes(child);
      walk(child);
    }
  }

  walk(root);

  for (const el of toRemove) {
    el.remove();
    elementsRemoved++;
  }

  let cleaned = root.toString();

  // Strip HTML comments
  cleaned = cleaned.replace(/<!--[\s\S]*?-->/g, '');

  // Collapse whitespace
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
  cleaned = cleaned.replace(/[^\S\n]{2,}/g, ' ');
  cleaned = cleaned.replace(/[ \t]+$/gm, '');

  const text = root.structuredText
    .split('\n')
    .map(collapseWhitespace)
    .filter(Boolean)
    .join('\n');

  return {
    html: cleaned.trim(),
    text,
    title,
    links,
    originalSize,
    cleanedSize: cleaned.length,
    elementsRemoved,
  };
}

function isElement(node: unknown): node is HTMLElement {
  return (
    typeof node === 'object' &&
    node !== null &&
    'nodeType' in node &&
    node.nodeType === 1 &&
    'tagName' in node &&
    typeof node.tagName === 'string'
  );
}

/** True when the element or a descendant looks like a pagination control. */
export function hasPaginationMarkup(el: HTMLElement): boolean {
  const stack: HTMLElement[] = [el];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    const marker = [
      current.getAttribute('class'),
      current.getAttribute('id'),
      current.getAttribute('aria-label'),
      current.getAttribute('rel'),
    ]
      .filter(Boolean)
      .join(' ');
    if (PAGINATION_MARKER.test(marker)) return true;

    const href = current.getAttribute('href') ?? '';
    if (/[?&]page=/i.test(href)) return true;

    for (const child of current.childNodes) {
      if (isElement(child)) stack.push(child);
    }
  }
  return false;
}

function collectLinks(root: HTMLElement, sourceUrl?: string): PageLink[] {
  const links: PageLink[] = [];
  const seen = new Set<string>();

  const push = (raw: string | undefined, text: string) => {
    const url = resolveHref(raw, sourceUrl);
    if (!url || seen.has(url)) return;
    seen.add(url);
    links.push({ text, url });
  };

  for (const a of root.querySelectorAll('a[href]')) {
    const text =
      collapseWhitespace(a.text) || a.getAttribute('aria-label') || a.getAttribute('title') || '';
    push(a.getAttribute('href'), text);
  }

  for (const frame of root.querySelectorAll('iframe[src]')) {
    const text = frame.getAttribute('title') || frame.getAttribute('name') || 'iframe';
    push(frame.getAttribute('src'), text);
  }

  return links;
}

/**
 * Resolve an href to an absolute http(s) URL without its fragment.
 * Returns null for script, mail, phone and fragment-only links.
 */
export function resolveHref(raw: string | undefined, baseUrl?: string): string | null {
  const href = raw?.trim();
  if (!href || href.startsWith('#') || /^(javascript|mailto|tel):/i.test(href)) return null;
  try {
    const url = baseUrl ? new URL(href, baseUrl) : new URL(href);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

/** Drop every attribute outside the allowlist: style, data-*, event handlers, tracking. */
function stripNoiseAttributes(el: HTMLElement): void {
  const toDelete = Object.keys(el.attributes).filter((key) => !KEEP_ATTRIBUTES.has(key.toLowerCase()));
  for (const key of toDelete) {
    el.removeAttribute(key);
  }
}
