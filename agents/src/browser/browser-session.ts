/**
 * Browser session — Playwright driver behind the BrowserDriver interface.
 *
 * Responsibilities:
 * - One Chromium browser and page per workflow (or per scheduled target)
 * - Open URLs, snapshot rendered HTML, click, fill, submit, capture PNGs
 * - Surface navigation timeouts as PageTimeoutError
 *
 * LLM Usage: None (pure Playwright automation)
 */

import { chromium, errors, type Browser, type Page } from 'playwright';
import { PageTimeoutError, RuntimeFailureError, toErrorMessage } from '@boardscout/core';

export interface BrowserDriver {
  open(url: string): Promise<void>;
  currentUrl(): string;
  currentHtml(): Promise<string>;
  /** Click the first match and wait for the resulting page to settle. */
  click(selector: string): Promise<void>;
  fill(selector: string, text: string): Promise<void>;
  /** Press Enter in the matched field and wait for the page to settle. */
  submit(selector: string): Promise<void>;
  /** Remove matches that are overlay roots (see isOverlayRoot); returns how many went. */
  removeOverlays(selectors: readonly string[]): Promise<number>;
  screenshot(): Promise<Buffer>;
  close(): Promise<void>;
}

/** What the page reports about an element matched by an overlay selector. */
export interface OverlayFacts {
  role: string | null;
  ariaModal: string | null;
  position: string;
  zIndex: string;
}

export const OVERLAY_MIN_Z_INDEX = 1000;

/**
 * Only dialogs and elements floating above the page count as overlays, so a
 * listing container whose class mentions cookies stays put.
 */
export function isOverlayRoot(facts: OverlayFacts): boolean {
  if (facts.role === 'dialog' || facts.role === 'alertdialog') return true;
  if (facts.ariaModal === 'true') return true;
  if (facts.position === 'fixed' || facts.position === 'sticky') return true;
  const z = Number.parseInt(facts.zIndex, 10);
  return Number.isFinite(z) && z >= OVERLAY_MIN_Z_INDEX;
}

export interface BrowserSessionConfig {
  headless?: boolean;
  /** Per-page navigation timeout */
  timeout?: number;
  /** Extra wait after navigation for client-rendered listings */
  settleMs?: number;
  userAgent?: string;
  viewport?: { width: number; height: number };
}

export const DEFAULT_BROWSER_CONFIG: Required<BrowserSessionConfig> = {
  headless: true,
  timeout: 30000,
  settleMs: 1500,
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  viewport: { width: 1920, height: 1080 },
};

export class PlaywrightBrowserSession implements BrowserDriver {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly config: Required<BrowserSessionConfig>,
  ) {}

  static async launch(config: BrowserSessionConfig = {}): Promise<PlaywrightBrowserSession> {
    const resolved = { ...DEFAULT_BROWSER_CONFIG, ...config };
    const browser = await chromium.launch({ headless: resolved.headless });
    try {
      const context = await browser.newContext({
        userAgent: resolved.userAgent,
        viewport: resolved.viewport,
      });
      const page = await context.newPage();
      page.setDefaultTimeout(resolved.timeout);
      return new PlaywrightBrowserSession(browser, page, resolved);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async open(url: string): Promise<void> {
    await this.guard(url, async () => {
      await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.timeout });
      await this.settle();
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async currentHtml(): Promise<string> {
    return this.page.content();
  }

  async click(selector: string): Promise<void> {
    await this.guard(this.page.url(), async () => {
      await this.page.locator(selector).first().click({ timeout: this.config.timeout });
      await this.settle();
    });
  }

  async fill(selector: string, text: string): Promise<void> {
    await this.guard(this.page.url(), async () => {
      await this.page.locator(selector).first().fill(text, { timeout: this.config.timeout });
    });
  }

  async submit(selector: string): Promise<void> {
    await this.guard(this.page.url(), async () => {
      await this.page.locator(selector).first().press('Enter', { timeout: this.config.timeout });
      await this.settle();
    });
  }

  async removeOverlays(selectors: readonly string[]): Promise<number> {
    let removed = 0;
    for (const selector of selectors) {
      const locator = this.page.locator(selector);
      const facts = await locator.evaluateAll((elements) =>
        elements.map((el) => {
          const style = window.getComputedStyle(el);
          return {
            role: el.getAttribute('role'),
            ariaModal: el.getAttribute('aria-modal'),
            position: style.position,
            zIndex: style.zIndex,
          };
        }),
      );
      const doomed = facts.map(isOverlayRoot);
      if (!doomed.includes(true)) continue;
      removed += await locator.evaluateAll((elements, marks) => {
        let count = 0;
        elements.forEach((el, i) => {
          if (!marks[i]) return;
          el.remove();
          count++;
        });
        return count;
      }, doomed);
    }
    return removed;
  }

  async screenshot(): Promise<Buffer> {
    return this.page.screenshot({ type: 'png', fullPage: false });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }

  private async settle(): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle', { timeout: this.config.settleMs * 4 });
    } catch (err) {
      // Long-polling pages never go idle; the DOM is already loaded.
      if (!(err instanceof errors.TimeoutError)) throw err;
    }
    await this.page.waitForTimeout(this.config.settleMs);
  }

  private async guard(url: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new PageTimeoutError(url, this.config.timeout, { cause: err });
      }
      throw new RuntimeFailureError(`Browser action failed on ${url}: ${toErrorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

export function launchBrowserSession(config?: BrowserSessionConfig): Promise<BrowserDriver> {
  return PlaywrightBrowserSession.launch(config);
}
