/**
 * Harvest orchestration: query → feed expansion → download
 */

import { getLogger } from '../utils/logger.js';
import { assertQueryImageReadable } from '../utils/config.js';
import type { HarvestConfig } from '../utils/config.js';
import { SessionSetupError, errorMessage } from '../utils/errors.js';
import { generateRunId } from '../manifest/io.js';
import { FeedExpander } from '../feed/expander.js';
import type { FeedExpansion } from '../feed/types.js';
import type { LocatorTable } from '../feed/locators.js';
import { DownloadManager, ensureOutputDir } from '../download/downloader.js';
import type { DownloadRun } from '../download/types.js';
import { createBrowserSession } from './session.js';
import { submitQuery } from './search.js';
import type { SubmitQueryOptions } from './search.js';
import type { BrowserSession, SessionOptions } from './types.js';

export type SessionFactory = (options: SessionOptions) => Promise<BrowserSession<unknown>>;

export interface HarvestDependencies {
  /** @default createBrowserSession */
  createSession?: SessionFactory;
  locators?: LocatorTable;
  navigationRetry?: SubmitQueryOptions['navigationRetry'];
  /** Stops feed expansion and downloads between units of work */
  signal?: AbortSignal;
}

export interface HarvestResult {
  feed: FeedExpansion;
  download: DownloadRun;
  /** Set when either stage stopped on the abort signal */
  aborted: boolean;
}

async function openSession(createSession: SessionFactory, config: HarvestConfig): Promise<BrowserSession<unknown>> {
  try {
    return await createSession({
      headless: config.headless,
      userAgent: config.userAgent,
      navigationTimeoutMs: config.navigationTimeoutMs,
    });
  } catch (error) {
    throw SessionSetupError.fromLaunchFailure(errorMessage(error));
  }
}

/**
 * Query, expand and collect inside one session; the session is closed before returning
 */
async function collectFeed(
  session: BrowserSession<unknown>,
  config: HarvestConfig,
  deps: HarvestDependencies
): Promise<FeedExpansion> {
  let phase = 'search';
  try {
    await submitQuery(session, config.queryImage, {
      searchUrl: config.searchUrl,
      settleMs: config.settleMs,
      locators: deps.locators,
      navigationRetry: deps.navigationRetry,
    });

    phase = 'feed';
    const expander = new FeedExpander({
      stabilityThreshold: config.stabilityThreshold,
      settleMs: config.settleMs,
      locators: deps.locators,
      signal: deps.signal,
    });
    return await expander.expand(session, config.maxScrollRounds);
  } catch (error) {
    if (session.captureArtifacts) {
      await session.captureArtifacts(config.outputDir, phase, generateRunId());
    }
    throw error;
  } finally {
    await session.close();
  }
}

/**
 * Run a full harvest for one query image.
 * Download failures are reported in the result, not thrown.
 *
 * @throws InvalidInputError, SessionSetupError, SearchSubmissionError, OutputDirectoryError
 */
export async function runHarvest(config: HarvestConfig, deps: HarvestDependencies = {}): Promise<HarvestResult> {
  const logger = getLogger();

  await assertQueryImageReadable(config.queryImage);
  await ensureOutputDir(config.outputDir);

  logger.info(`Searching for images similar to ${config.queryImage}`);

  const session = await openSession(deps.createSession ?? createBrowserSession, config);
  const feed = await collectFeed(session, config, deps);

  if (feed.urls.size === 0) {
    logger.warn('No image URLs found in the results feed');
  }

  const manager = new DownloadManager({
    requestTimeoutMs: config.requestTimeoutMs,
    delayMs: config.downloadDelayMs,
    concurrency: config.concurrency,
    retry: { maxAttempts: config.retryAttempts },
    userAgent: config.userAgent,
    source: config.queryImage,
    signal: deps.signal,
  });
  const download = await manager.download(feed.urls, config.outputDir);

  return { feed, download, aborted: feed.reason === 'aborted' || download.summary.aborted };
}

export { createBrowserSession } from './session.js';
export { submitQuery } from './search.js';
export type { BrowserSession, SessionOptions } from './types.js';
export { FeedExpander } from '../feed/expander.js';
export { DEFAULT_LOCATORS } from '../feed/locators.js';
export type { LocatorTable } from '../feed/locators.js';
export type { FeedExpansion, TerminationReason } from '../feed/types.js';
export { DownloadManager } from '../download/downloader.js';
export type { DownloadOptions, DownloadRecord, DownloadRun, RunSummary } from '../download/types.js';
export { parseHarvestConfig } from '../utils/config.js';
export type { HarvestConfig, HarvestConfigInput } from '../utils/config.js';
