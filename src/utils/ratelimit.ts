/**
 * Rate limiting wrapper with fixed/random delay between actions
 * - Waits between minDelayMs and maxDelayMs before running fn
 * - Equal bounds give a fixed delay
 */

import { getLogger } from './logger.js';
import { sleep } from './sleep.js';

export interface RateLimitOptions {
  minDelayMs?: number; // default 500
  maxDelayMs?: number; // default 1500
}

function calculateRandomDelay(minDelayMs: number, maxDelayMs: number): number {
  return minDelayMs + Math.random() * (maxDelayMs - minDelayMs);
}

export async function rateLimit<T>(fn: () => Promise<T>, options?: RateLimitOptions): Promise<T> {
  const minDelayMs = options?.minDelayMs ?? 500;
  const maxDelayMs = Math.max(minDelayMs, options?.maxDelayMs ?? 1500);

  const delayMs = calculateRandomDelay(minDelayMs, maxDelayMs);
  if (delayMs > 0) {
    getLogger().debug(`Rate limiting: waiting ${Math.round(delayMs)}ms before next request`);
    await sleep(delayMs);
  }
  return fn();
}

/**
 * Fixed-delay options for a given pause length
 */
export function fixedDelay(delayMs: number): RateLimitOptions {
  return { minDelayMs: delayMs, maxDelayMs: delayMs };
}
