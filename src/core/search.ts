/**
 * Query submission: open the search page, upload the query image and switch
 * to the similar-images results
 */

import { resolve } from 'path';
import { getLogger } from '../utils/logger.js';
import { SearchSubmissionError, errorMessage } from '../utils/errors.js';
import { RetryOptions, retry } from '../utils/retry.js';
import { sleep } from '../utils/sleep.js';
import {
  DEFAULT_LOCATORS,
  LocatorTable,
  locateAllVisible,
  locateFirstMatching,
  locateFirstVisible,
} from '../feed/locators.js';
import type { BrowserSession } from './types.js';

export interface SubmitQueryOptions {
  searchUrl: string;
  /** @default 2000 */
  settleMs?: number;
  locators?: LocatorTable;
  /**
   * Policy for opening the search page
   * @default { maxAttempts: 3 }
   */
  navigationRetry?: RetryOptions;
}

export interface SubmitQueryResult {
  /** Whether the results tab was found and clicked */
  resultsTabClicked: boolean;
}

async function findUploadInput<H>(session: BrowserSession<H>, locators: LocatorTable, settleMs: number): Promise<H | null> {
  const logger = getLogger();

  const direct = await locateFirstMatching(session, locators.uploadInput);
  if (direct) {
    logger.debug(`Found file input via "${direct.locator}"`);
    return direct.handles[0];
  }

  const triggers = await locateAllVisible(session, locators.uploadTrigger);
  for (const trigger of triggers) {
    try {
      await session.click(trigger);
    } catch (error) {
      logger.debug(`Upload trigger click failed, trying the next one: ${errorMessage(error)}`);
      continue;
    }
    logger.debug('Clicked upload trigger');
    await sleep(settleMs);

    const revealed = await locateFirstMatching(session, locators.uploadInput);
    if (revealed) {
      return revealed.handles[0];
    }
  }

  return null;
}

/**
 * @throws SearchSubmissionError when the page cannot be opened, has no upload control or rejects the upload
 */
export async function submitQuery<H>(
  session: BrowserSession<H>,
  queryImage: string,
  options: SubmitQueryOptions
): Promise<SubmitQueryResult> {
  const logger = getLogger();
  const settleMs = options.settleMs ?? 2000;
  const locators = options.locators ?? DEFAULT_LOCATORS;

  logger.phaseStart('Query submission');
  logger.info(`Opening ${options.searchUrl}`);

  try {
    await retry(() => session.navigate(options.searchUrl), {
      maxAttempts: 3,
      ...options.navigationRetry,
      operationName: 'navigate',
    });
  } catch (error) {
    throw SearchSubmissionError.fromNavigationFailure(options.searchUrl, errorMessage(error));
  }
  await sleep(settleMs);

  const input = await findUploadInput(session, locators, settleMs);
  if (input === null) {
    throw SearchSubmissionError.fromMissingUploadControl();
  }

  const absolutePath = resolve(queryImage);
  try {
    await session.uploadFile(input, absolutePath);
  } catch (error) {
    throw SearchSubmissionError.fromUploadFailure(absolutePath, errorMessage(error));
  }
  logger.info(`Uploaded query image: ${absolutePath}`);
  await sleep(settleMs);

  const tab = await locateFirstVisible(session, locators.resultsTab);
  let resultsTabClicked = false;
  if (tab) {
    try {
      await session.click(tab);
      resultsTabClicked = true;
      logger.debug('Clicked similar-images tab');
      await sleep(settleMs);
    } catch (error) {
      logger.warn(`Similar-images tab click failed, continuing with current results: ${errorMessage(error)}`);
    }
  } else {
    logger.info('Similar-images tab not found, continuing with current results');
  }

  logger.phaseComplete('Query submission');
  return { resultsTabClicked };
}
