/**
 * Cookie and consent overlays intercept clicks on pagination controls.
 * Known accept buttons are clicked first; dialogs and floating banners that
 * are left are removed from the DOM.
 */

import { parse } from 'node-html-parser';
import { isEscalatingError, toErrorMessage, type AgentLogger } from '@boardscout/core';
import type { BrowserDriver } from '../browser/browser-session.js';

export const OVERLAY_ACCEPT_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '#truste-consent-button',
  '#accept-cookies',
  'button[aria-label="Accept cookies"]',
  '.cc-allow',
];

export const OVERLAY_SELECTORS = [
  '#onetrust-consent-sdk',
  '#truste-consent-track',
  '[id*="cookie-banner"]',
  '[class*="cookie-banner"]',
  '[class*="cookie-consent"]',
  '[class*="consent-banner"]',
  '[class*="gdpr"]',
  '[role="dialog"][aria-label*="cookie" i]',
  '[role="dialog"][aria-label*="consent" i]',
];

export async function dismissOverlays(
  driver: BrowserDriver,
  logger: AgentLogger,
): Promise<{ accepted: number; removed: number }> {
  let accepted = 0;
  const root = parse(await driver.currentHtml());

  for (const selector of OVERLAY_ACCEPT_SELECTORS) {
    if (!root.querySelector(selector)) continue;
    try {
      await driver.click(selector);
      accepted++;
    } catch (err) {
      if (isEscalatingError(err)) throw err;
      logger.debug(`Overlay button ${selector} not clickable`, toErrorMessage(err));
    }
  }

  let removed = 0;
  try {
    removed = await driver.removeOverlays(OVERLAY_SELECTORS);
  } catch (err) {
    if (isEscalatingError(err)) throw err;
    logger.warn('Overlay removal failed', toErrorMessage(err));
  }

  if (accepted || removed) logger.debug('Overlays dismissed', { accepted, removed });
  return { accepted, removed };
}
