/**
 * Download stage types
 */

import type { RetryOptions } from '../utils/retry.js';

export type DownloadOutcome = 'success' | 'skipped-duplicate' | 'failed';

interface RecordBase {
  url: string;
  /** Final path for successes and skips, intended path for failures */
  targetPath: string;
}

export interface SuccessRecord extends RecordBase {
  outcome: 'success';
  sizeBytes: number;
  contentType?: string;
}

export interface SkippedRecord extends RecordBase {
  outcome: 'skipped-duplicate';
}

export interface FailedRecord extends RecordBase {
  outcome: 'failed';
  errorDetail: string;
  /** HTTP status when the server answered */
  status?: number;
}

export type DownloadRecord = SuccessRecord | SkippedRecord | FailedRecord;

export interface RunSummary {
  attempted: number;
  succeeded: number;
  skipped: number;
  failed: number;
  outputDir: string;
  /** True when the abort signal stopped the run before every URL was processed */
  aborted: boolean;
}

export interface DownloadRun {
  runId: string;
  summary: RunSummary;
  records: DownloadRecord[];
}

export interface DownloadOptions {
  /**
   * Per-request timeout (ms)
   * @default 15000
   */
  requestTimeoutMs?: number;

  /**
   * Pause before each URL after the first, per worker (ms)
   * @default 100
   */
  delayMs?: number;

  /**
   * Parallel workers
   * @default 1
   */
  concurrency?: number;

  /**
   * Retry policy around each GET
   * @default { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 5000, jitterMaxMs: 250 }
   */
  retry?: RetryOptions;

  /** Request headers; merged over the browser-like defaults */
  headers?: Record<string, string>;

  userAgent?: string;

  /** Recorded in the manifest run entry */
  source?: string;

  /** Checked before every URL */
  signal?: AbortSignal;
}
