/**
 * CLI argument parsing types
 */

export interface CliOptions {
  out: string;
  maxScrolls?: number;
  stability?: number;
  timeoutMs?: number;
  navigationTimeoutMs?: number;
  settleMs?: number;
  delayMs?: number;
  concurrency?: number;
  retries?: number;
  searchUrl?: string;
  userAgent?: string;
  headful?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export type CliAction = (queryImage: string, options: CliOptions) => Promise<void> | void;

/**
 * Shape printed by --json
 */
export interface CliJsonResult {
  feed: {
    urls: string[];
    reason: string;
    scrollCount: number;
    expandClicked: boolean;
  };
  download: {
    runId: string;
    attempted: number;
    succeeded: number;
    skipped: number;
    failed: number;
    outputDir: string;
    aborted: boolean;
    failures: Array<{ url: string; error: string }>;
  };
}
