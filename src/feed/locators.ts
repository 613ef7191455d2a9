/**
 * Locator tables and fallback-chain lookups
 * Each role holds an ordered list of locator strings; the first one that
 * matches wins. Swapping or reordering entries never touches control flow.
 */

import type { BrowserSession } from '../core/types.js';
import { getLogger } from '../utils/logger.js';

export type ElementRole = 'uploadInput' | 'uploadTrigger' | 'resultsTab' | 'loadMore' | 'thumbnail';

export interface LocatorTable {
  readonly uploadInput: readonly string[];
  readonly uploadTrigger: readonly string[];
  readonly resultsTab: readonly string[];
  readonly loadMore: readonly string[];
  readonly thumbnail: readonly string[];
  /** Attributes read from each thumbnail element, in order, for its media URL */
  readonly mediaAttributes: readonly string[];
}

export const DEFAULT_LOCATORS: LocatorTable = {
  uploadInput: ["input[type='file']"],
  uploadTrigger: [
    "button[aria-label*='camera']",
    "button[aria-label*='Camera']",
    '.search-form__camera',
    'button.cbir-button',
    "[class*='camera']",
  ],
  resultsTab: [
    "//a[contains(text(), 'Similar images')]",
    "//button[contains(text(), 'Similar')]",
    "//*[contains(text(), 'Похожие')]",
    "a[href*='similar']",
    "[class*='similar']",
  ],
  loadMore: [
    '.FetchListButton-Button',
    "//button[contains(text(), 'Show more')]",
    "//button[contains(text(), 'show more')]",
    "[class*='show-more']",
    "[class*='load-more']",
  ],
  thumbnail: [
    "a[href*='img_url']",
    '.serp-item__link img',
    '.SerpItem img',
    "[class*='serp-item'] img",
    "a[href*='rpt=imageview'] img",
  ],
  mediaAttributes: ['href', 'src', 'data-src'],
};

export interface ChainMatch<H> {
  locator: string;
  handles: H[];
}

async function safeFind<H>(session: BrowserSession<H>, locator: string): Promise<H[]> {
  try {
    return await session.findElements(locator);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().debug(`Locator "${locator}" failed, treating as no match: ${message}`);
    return [];
  }
}

/**
 * First locator in the chain with at least one match, or null when the chain
 * is exhausted
 */
export async function locateFirstMatching<H>(
  session: BrowserSession<H>,
  chain: readonly string[]
): Promise<ChainMatch<H> | null> {
  for (const locator of chain) {
    const handles = await safeFind(session, locator);
    if (handles.length > 0) {
      return { locator, handles };
    }
  }
  return null;
}

async function safeIsVisible<H>(session: BrowserSession<H>, handle: H, locator: string): Promise<boolean> {
  try {
    return await session.isVisible(handle);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().debug(`Visibility check failed for "${locator}": ${message}`);
    return false;
  }
}

/**
 * First visible element across the chain, in chain order
 */
export async function locateFirstVisible<H>(
  session: BrowserSession<H>,
  chain: readonly string[]
): Promise<H | null> {
  for (const locator of chain) {
    const handles = await safeFind(session, locator);
    for (const handle of handles) {
      if (await safeIsVisible(session, handle, locator)) {
        return handle;
      }
    }
  }
  return null;
}

/**
 * Every visible element across the chain, in chain order
 */
export async function locateAllVisible<H>(session: BrowserSession<H>, chain: readonly string[]): Promise<H[]> {
  const visible: H[] = [];
  for (const locator of chain) {
    const handles = await safeFind(session, locator);
    for (const handle of handles) {
      if (await safeIsVisible(session, handle, locator)) {
        visible.push(handle);
      }
    }
  }
  return visible;
}
