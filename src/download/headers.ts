import { DEFAULT_USER_AGENT } from '../utils/config.js';

/**
 * Header set a desktop browser sends for an <img> request; image hosts
 * commonly reject requests without one
 */
export function browserRequestHeaders(
  userAgent: string = DEFAULT_USER_AGENT,
  overrides: Record<string, string> = {}
): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Sec-Fetch-Dest': 'image',
    'Sec-Fetch-Mode': 'no-cors',
    'Sec-Fetch-Site': 'cross-site',
    ...overrides,
  };
}
