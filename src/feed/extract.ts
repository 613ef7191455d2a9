/**
 * Media URL extraction from matched thumbnail elements
 */

import type { BrowserSession } from '../core/types.js';
import { getLogger } from '../utils/logger.js';
import { normalizeMediaUrl } from '../utils/url.js';

/**
 * First usable media URL on one element, trying attributes in order
 */
export async function readMediaUrl<H>(
  session: BrowserSession<H>,
  handle: H,
  attributes: readonly string[],
  baseUrl?: string
): Promise<string | null> {
  const logger = getLogger();

  for (const name of attributes) {
    let raw: string | null;
    try {
      raw = await session.readAttribute(handle, name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Reading "${name}" failed: ${message}`);
      continue;
    }
    if (!raw) continue;

    const normalized = normalizeMediaUrl(raw, baseUrl);
    if (normalized.ok) {
      return normalized.url;
    }
    logger.debug(`Skipping ${name} value: ${normalized.reason} (input: ${normalized.input.slice(0, 80)})`);
  }

  return null;
}

/**
 * Distinct media URLs across elements, in first-seen order.
 * Relative attribute values resolve against `baseUrl`.
 */
export async function extractMediaUrls<H>(
  session: BrowserSession<H>,
  handles: readonly H[],
  attributes: readonly string[],
  baseUrl?: string
): Promise<Set<string>> {
  const urls = new Set<string>();
  for (const handle of handles) {
    const url = await readMediaUrl(session, handle, attributes, baseUrl);
    if (url) {
      urls.add(url);
    }
  }
  return urls;
}
