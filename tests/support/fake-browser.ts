import { parse } from 'node-html-parser';
import { PageTimeoutError, RuntimeFailureError } from '@boardscout/core';
import { isOverlayRoot, type BrowserDriver } from '@boardscout/agents';

export interface FakeSite {
  /** HTML served per URL */
  pages: Record<string, string>;
  /** url -> selector -> url the click lands on; `enter:<selector>` for submit */
  transitions?: Record<string, Record<string, string>>;
  /** URLs whose navigation times out */
  timeouts?: string[];
  /** Opening this URL lands on another one */
  redirects?: Record<string, string>;
}

/** In-process stand-in for a Playwright session over a fixed set of pages. */
export class FakeBrowserDriver implements BrowserDriver {
  readonly actions: string[] = [];
  readonly removals: string[][] = [];
  closed = false;
  private url = 'about:blank';

  constructor(private readonly site: FakeSite) {}

  async open(url: string): Promise<void> {
    this.actions.push(`open ${url}`);
    this.navigate(this.site.redirects?.[url] ?? url);
  }

  currentUrl(): string {
    return this.url;
  }

  async currentHtml(): Promise<string> {
    return this.site.pages[this.url] ?? '';
  }

  async click(selector: string): Promise<void> {
    this.actions.push(`click ${selector}`);
    const target = this.site.transitions?.[this.url]?.[selector];
    if (target) {
      this.navigate(target);
      return;
    }
    if (!parse(await this.currentHtml()).querySelector(selector)) {
      throw new RuntimeFailureError(`No element matches ${selector}`);
    }
  }

  async fill(selector: string, text: string): Promise<void> {
    this.actions.push(`fill ${selector}=${text}`);
  }

  async submit(selector: string): Promise<void> {
    this.actions.push(`enter ${selector}`);
    const target = this.site.transitions?.[this.url]?.[`enter:${selector}`];
    if (target) this.navigate(target);
  }

  /** Counts overlay roots by their attributes and inline style; the page is left as served. */
  async removeOverlays(selectors: readonly string[]): Promise<number> {
    this.removals.push([...selectors]);
    const root = parse(await this.currentHtml());
    let removed = 0;
    for (const selector of selectors) {
      for (const el of root.querySelectorAll(selector)) {
        const style = inlineStyle(el.getAttribute('style') ?? '');
        const facts = {
          role: el.getAttribute('role') ?? null,
          ariaModal: el.getAttribute('aria-modal') ?? null,
          position: style.get('position') ?? 'static',
          zIndex: style.get('z-index') ?? 'auto',
        };
        if (isOverlayRoot(facts)) removed++;
      }
    }
    return removed;
  }

  async screenshot(): Promise<Buffer> {
    return Buffer.from(`png:${this.url}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private navigate(url: string): void {
    if (this.site.timeouts?.includes(url)) throw new PageTimeoutError(url, 30000);
    if (!(url in this.site.pages)) throw new RuntimeFailureError(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    this.url = url;
  }
}

export interface ListingRow {
  title?: string;
  href?: string;
  description?: string;
  location?: string;
}

/** A listing page with `.job-row` items and an optional `a.next` control. */
export function listingPage(
  rows: ListingRow[],
  next?: { href?: string; className?: string; parentAttrs?: string },
): string {
  const items = rows
    .map((row) => {
      const href = row.href ? ` href="${row.href}"` : '';
      const description = row.description ? `<p class="job-desc">${row.description}</p>` : '';
      const location = row.location ? `<span class="job-location">${row.location}</span>` : '';
      return `<li class="job-row"><a class="job-title"${href}>${row.title ?? ''}</a>${description}${location}</li>`;
    })
    .join('\n');
  const control = next
    ? `<div class="pager"${next.parentAttrs ? ` ${next.parentAttrs}` : ''}><a class="${next.className ?? 'next'}" href="${next.href ?? '#'}">Next</a></div>`
    : '';
  return `<html><head><title>Careers</title></head><body><ul class="jobs">${items}</ul>${control}</body></html>`;
}

function inlineStyle(style: string): Map<string, string> {
  const declarations = new Map<string, string>();
  for (const part of style.split(';')) {
    const [name, value] = part.split(':');
    if (name && value) declarations.set(name.trim().toLowerCase(), value.trim());
  }
  return declarations;
}
