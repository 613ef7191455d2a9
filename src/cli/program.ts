import { Command, InvalidArgumentError } from 'commander';
import type { HarvestConfigInput } from '../utils/config.js';
import type { HarvestResult } from '../core/index.js';
import type { CliAction, CliJsonResult, CliOptions } from './types.js';

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`expected an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('feed-harvest')
    .description('Reverse-image search: expand the similar-images feed and download every result')
    .version('0.1.0')
    .argument('<queryImage>', 'Path of the image to search with')
    .option('--out <dir>', 'Output directory for downloaded images', 'feed-harvest-images')
    .option('--max-scrolls <number>', 'Maximum scroll rounds (default: 50)', parseInteger)
    .option('--stability <number>', 'Rounds without new results before stopping (default: 3)', parseInteger)
    .option('--timeout-ms <number>', 'Per-download timeout in milliseconds (default: 15000, max: 300000)', parseInteger)
    .option('--navigation-timeout-ms <number>', 'Page navigation timeout in milliseconds (default: 60000)', parseInteger)
    .option('--settle-ms <number>', 'Pause after each scroll or click in milliseconds (default: 2000)', parseInteger)
    .option('--delay-ms <number>', 'Pause between downloads in milliseconds (default: 100)', parseInteger)
    .option('--concurrency <number>', 'Parallel downloads (default: 1, max: 16)', parseInteger)
    .option('--retries <number>', 'Attempts per download (default: 3, max: 10)', parseInteger)
    .option('--search-url <url>', 'Search page to upload the image to')
    .option('--user-agent <string>', 'User agent for the browser and downloads')
    .option('--headful', 'Run browser in headful mode (default: headless)')
    .option('--json', 'Print the result as JSON on stdout')
    .option('--verbose', 'Enable verbose logging')
    .action(action);

  return program;
}

/**
 * Map parsed flags onto config input; unset flags fall through to schema defaults
 */
export function toConfigInput(queryImage: string, options: CliOptions): HarvestConfigInput {
  return {
    queryImage,
    outputDir: options.out,
    maxScrollRounds: options.maxScrolls,
    stabilityThreshold: options.stability,
    headless: !options.headful,
    requestTimeoutMs: options.timeoutMs,
    navigationTimeoutMs: options.navigationTimeoutMs,
    settleMs: options.settleMs,
    downloadDelayMs: options.delayMs,
    concurrency: options.concurrency,
    retryAttempts: options.retries,
    searchUrl: options.searchUrl,
    userAgent: options.userAgent,
  };
}

export function toJsonResult(result: HarvestResult): CliJsonResult {
  const { feed, download } = result;
  const failures: CliJsonResult['download']['failures'] = [];
  for (const record of download.records) {
    if (record.outcome === 'failed') {
      failures.push({ url: record.url, error: record.errorDetail });
    }
  }

  return {
    feed: {
      urls: [...feed.urls],
      reason: feed.reason,
      scrollCount: feed.scrollCount,
      expandClicked: feed.expandClicked,
    },
    download: {
      runId: download.runId,
      ...download.summary,
      failures,
    },
  };
}
