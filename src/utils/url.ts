/**
 * URL normalization for media URLs read out of result markup
 * Handles protocol-relative URLs, HTML entities, redirect wrappers, and
 * rejects unsupported protocols
 */

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; reason: string; input: string };

/** Query parameter some result links use to carry the original image URL */
const REDIRECT_PARAMS = ['img_url'];

function decodeEntities(value: string): string {
  return value
    .replace(/&amp;/g, '&')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>');
}

/**
 * Normalize and validate a media URL
 *
 * Rules:
 * - HTML entities (&amp; etc.) decoded
 * - Protocol-relative URLs (//host/path) → https://host/path
 * - Relative URLs resolved against baseUrl when given
 * - Links carrying img_url=<url> unwrapped to that URL
 * - HTTP and HTTPS kept as-is, query strings preserved
 * - Rejects: data:, blob:, empty, and other non-http(s) schemes
 *
 * @param input - Raw attribute value
 * @param baseUrl - Page URL for resolving relative values
 */
export function normalizeMediaUrl(input: string, baseUrl?: string): NormalizeResult {
  if (!input || input.trim() === '') {
    return { ok: false, reason: 'Invalid URL: empty input', input };
  }

  let candidate = decodeEntities(input.trim());
  if (candidate.startsWith('//')) {
    candidate = `https:${candidate}`;
  }

  let url: URL;
  try {
    url = baseUrl ? new URL(candidate, baseUrl) : new URL(candidate);
  } catch {
    return { ok: false, reason: 'Invalid URL: failed to parse', input };
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { ok: false, reason: `Unsupported protocol: ${url.protocol}`, input };
  }

  for (const param of REDIRECT_PARAMS) {
    const wrapped = url.searchParams.get(param);
    if (wrapped) {
      const inner = normalizeMediaUrl(wrapped);
      if (inner.ok) {
        return inner;
      }
    }
  }

  return { ok: true, url: url.toString() };
}
