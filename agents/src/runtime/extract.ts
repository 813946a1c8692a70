/**
 * Per-page extraction against an HTML snapshot. Pure: no browser access.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import { ExtractionFailureError, collapseWhitespace, toErrorMessage } from '@boardscout/core';
import type { JobRecord, ScrapingConfiguration } from '@boardscout/schemas';
import { resolveHref } from '../browser/html-cleanup-agent.js';

export type NextControlState = 'absent' | 'disabled' | 'available';

export interface PageExtraction {
  /** Elements matched by the list item selector */
  itemCount: number;
  /** Items with a title and an absolute url, in page order */
  candidates: JobRecord[];
  /** Items dropped for a missing title or url */
  malformed: number;
  nextControl: NextControlState;
}

export interface ExtractionMeta {
  targetId: string | null;
  scrapedAt: string;
}

export function extractListings(
  html: string,
  pageUrl: string,
  configuration: ScrapingConfiguration,
  meta: ExtractionMeta,
): PageExtraction {
  const root = parse(html);
  const { fields } = configuration;
  const items = selectAll(root, configuration.listItemSelector);

  const candidates: JobRecord[] = [];
  let malformed = 0;

  for (const item of items) {
    const title = textOf(item, fields.title);
    const url = urlOf(item, fields.url, pageUrl);
    if (!title || !url) {
      malformed++;
      continue;
    }
    candidates.push({
      title,
      url,
      description: textOf(item, fields.description),
      location: textOf(item, fields.location),
      postedDate: textOf(item, fields.postedDate),
      scrapedAt: meta.scrapedAt,
      targetId: meta.targetId,
    });
  }

  return {
    itemCount: items.length,
    candidates,
    malformed,
    nextControl: configuration.paginationSelector
      ? inspectNextControl(root, configuration.paginationSelector)
      : 'absent',
  };
}

/**
 * A next control is unusable when it, or one of its two nearest ancestors,
 * is disabled or hidden.
 */
export function inspectNextControl(root: HTMLElement, selector: string): NextControlState {
  const control = selectOne(root, selector);
  if (!control) return 'absent';

  let current: HTMLElement | null = control;
  for (let depth = 0; current && depth < 3; depth++) {
    if (isDisabledOrHidden(current, depth === 0)) return 'disabled';
    current = current.parentNode;
  }
  return 'available';
}

function isDisabledOrHidden(el: HTMLElement, isControl: boolean): boolean {
  const className = (el.getAttribute('class') ?? '').toLowerCase();
  if (/(^|[\s_-])disabled($|[\s_-])/.test(className)) return true;
  if (el.getAttribute('aria-disabled') === 'true') return true;
  const style = (el.getAttribute('style') ?? '').replace(/\s+/g, '').toLowerCase();
  if (style.includes('display:none') || style.includes('visibility:hidden')) return true;
  if (!isControl) return false;
  return el.hasAttribute('disabled') || el.hasAttribute('hidden');
}

function textOf(item: HTMLElement, selector?: string): string | undefined {
  if (!selector) return undefined;
  const el = selectOne(item, selector);
  const text = el ? collapseWhitespace(el.text) : '';
  return text || undefined;
}

/**
 * href of the url field, of an anchor inside it, or of the list item itself.
 */
function urlOf(item: HTMLElement, selector: string, pageUrl: string): string | undefined {
  const el = selectOne(item, selector);
  const href =
    el?.getAttribute('href') ??
    el?.querySelector('a[href]')?.getAttribute('href') ??
    item.getAttribute('href');
  return resolveHref(href, pageUrl) ?? undefined;
}

function selectAll(root: HTMLElement, selector: string): HTMLElement[] {
  try {
    return root.querySelectorAll(selector);
  } catch (err) {
    throw new ExtractionFailureError(
      `Selector "${selector}" could not be evaluated: ${toErrorMessage(err)}`,
      { cause: err },
    );
  }
}

function selectOne(root: HTMLElement, selector: string): HTMLElement | null {
  try {
    return root.querySelector(selector);
  } catch (err) {
    throw new ExtractionFailureError(
      `Selector "${selector}" could not be evaluated: ${toErrorMessage(err)}`,
      { cause: err },
    );
  }
}
