/**
 * Retry wrapper with exponential backoff + jitter
 * - Retries transient failures: timeouts, connection errors, 5xx, 429
 * - Fails fast on deterministic failures: other 4xx, parse errors
 * - Formula: delay = baseDelay * 2^attempt + random(0, jitterMax)
 */

import { getLogger } from './logger.js';
import { sleep } from './sleep.js';

export interface RetryOptions {
  maxAttempts?: number; // default 5
  baseDelayMs?: number; // default 1000
  maxDelayMs?: number; // default 30000
  jitterMaxMs?: number; // default 1000
  /** Label used in debug output */
  operationName?: string;
}

/**
 * Thrown once retrying stops; wraps the last underlying error
 */
export class RetryError extends Error {
  readonly isTransient: boolean;
  readonly lastError: Error;
  readonly attempts: number;

  constructor(lastError: Error, attempts: number, isTransient: boolean) {
    super(`Failed after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetryError';
    this.lastError = lastError;
    this.attempts = attempts;
    this.isTransient = isTransient;
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Determine if an error is transient (should retry) or deterministic (fail fast)
 */
function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    if ((status >= 500 && status < 600) || status === 429) {
      return true;
    }
    if (status >= 400 && status < 500) {
      return false;
    }
  }

  if (
    error instanceof SyntaxError ||
    (error instanceof TypeError && /invalid url|failed to parse url/i.test(error.message))
  ) {
    return false;
  }

  if (error instanceof Error) {
    const msg = `${error.name} ${error.message}`.toLowerCase();
    if (
      msg.includes('timeout') ||
      msg.includes('econnrefused') ||
      msg.includes('econnreset') ||
      msg.includes('fetch failed')
    ) {
      return true;
    }
  }

  // Default to transient for unknown errors
  return true;
}

function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMaxMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMaxMs;
  return cappedDelay + jitter;
}

/**
 * Executes fn with exponential backoff on transient failures
 */
export async function retry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 5);
  const baseDelayMs = options?.baseDelayMs ?? 1000;
  const maxDelayMs = options?.maxDelayMs ?? 30000;
  const jitterMaxMs = options?.jitterMaxMs ?? 1000;
  const label = options?.operationName ? `${options.operationName}: ` : '';

  const logger = getLogger();

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!isTransientError(error)) {
        logger.debug(`${label}deterministic failure (not retrying): ${lastError.message}`);
        throw new RetryError(lastError, attempt + 1, false);
      }

      if (attempt + 1 >= maxAttempts) {
        logger.debug(`${label}max attempts (${maxAttempts}) reached: ${lastError.message}`);
        throw new RetryError(lastError, maxAttempts, true);
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMaxMs);
      logger.debug(
        `${label}transient failure (attempt ${attempt + 1}/${maxAttempts}): ${lastError.message}. Retrying in ${Math.round(delayMs)}ms...`
      );

      await sleep(delayMs);
    }
  }
}

export { isTransientError };
