/**
 * Feed expansion: grow a lazily-loaded results feed by scrolling and a single
 * "load more" click, then collect the media URLs of every thumbnail present.
 *
 * Convergence is best-effort. A feed that stalls for `stabilityThreshold`
 * rounds, or whose scroll position stops moving, is treated as complete even
 * if the remote side would have served more later.
 */

import type { BrowserSession } from '../core/types.js';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { extractMediaUrls } from './extract.js';
import { DEFAULT_LOCATORS, LocatorTable, locateFirstMatching, locateFirstVisible } from './locators.js';
import type { FeedExpanderOptions, FeedExpansion, FeedState, TerminationReason } from './types.js';

export const DEFAULT_STABILITY_THRESHOLD = 3;
export const DEFAULT_SETTLE_MS = 2000;

export class FeedExpander {
  private readonly stabilityThreshold: number;
  private readonly settleMs: number;
  private readonly locators: LocatorTable;
  private readonly signal?: AbortSignal;

  constructor(options: FeedExpanderOptions = {}) {
    this.stabilityThreshold = options.stabilityThreshold ?? DEFAULT_STABILITY_THRESHOLD;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.locators = options.locators ?? DEFAULT_LOCATORS;
    this.signal = options.signal;

    if (!Number.isInteger(this.stabilityThreshold) || this.stabilityThreshold < 1) {
      throw new RangeError(`stabilityThreshold must be a positive integer, got ${this.stabilityThreshold}`);
    }
  }

  /**
   * Expand the feed on a session already showing the results page.
   * Never performs more than `maxScrollRounds` scrolls.
   */
  async expand<H>(session: BrowserSession<H>, maxScrollRounds: number): Promise<FeedExpansion> {
    if (!Number.isInteger(maxScrollRounds) || maxScrollRounds < 1) {
      throw new RangeError(`maxScrollRounds must be a positive integer, got ${maxScrollRounds}`);
    }

    const logger = getLogger();
    const state: FeedState = {
      knownUrls: new Set<string>(),
      scrollCount: 0,
      stableRounds: 0,
      expandClicked: false,
    };

    logger.phaseStart('Feed expansion');
    logger.debug(`Scrolling (max ${maxScrollRounds} rounds, stability threshold ${this.stabilityThreshold})`);

    const reason = await this.runRounds(session, state, maxScrollRounds);
    logger.debug(`Stopping reason: ${describeReason(reason, state, maxScrollRounds, this.stabilityThreshold)}`);

    const match = await locateFirstMatching(session, this.locators.thumbnail);
    if (match) {
      const pageUrl = await this.readPageUrl(session);
      const urls = await extractMediaUrls(session, match.handles, this.locators.mediaAttributes, pageUrl);
      urls.forEach((url) => state.knownUrls.add(url));
      logger.debug(`Extracted ${state.knownUrls.size} URLs from ${match.handles.length} elements via "${match.locator}"`);
    } else {
      logger.warn('No result thumbnails matched any configured locator');
    }

    logger.phaseComplete(
      'Feed expansion',
      `${state.knownUrls.size} URLs after ${state.scrollCount} scrolls (${reason})`
    );

    return {
      urls: state.knownUrls,
      reason,
      scrollCount: state.scrollCount,
      expandClicked: state.expandClicked,
      matchedLocator: match?.locator ?? null,
    };
  }

  private async readPageUrl<H>(session: BrowserSession<H>): Promise<string | undefined> {
    try {
      return await session.currentUrl();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      getLogger().debug(`Page URL unavailable, relative links will be skipped: ${message}`);
      return undefined;
    }
  }

  private async runRounds<H>(
    session: BrowserSession<H>,
    state: FeedState,
    maxScrollRounds: number
  ): Promise<TerminationReason> {
    const logger = getLogger();
    let lastPosition = await session.currentScrollPosition();

    while (true) {
      if (this.signal?.aborted) {
        return 'aborted';
      }

      const before = await this.countFeedItems(session);

      await session.scrollToBottom();
      state.scrollCount++;
      await sleep(this.settleMs);

      if (!state.expandClicked) {
        const control = await locateFirstVisible(session, this.locators.loadMore);
        if (control) {
          // Marked before clicking: the control is expected once per run
          state.expandClicked = true;
          try {
            await session.click(control);
            logger.debug(`Round ${state.scrollCount}: clicked load-more control`);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.debug(`Round ${state.scrollCount}: load-more click failed: ${message}`);
          }
          await sleep(this.settleMs);

          if (state.scrollCount >= maxScrollRounds) {
            return 'capped';
          }
          lastPosition = await session.currentScrollPosition();
          continue;
        }
      }

      const after = await this.countFeedItems(session);
      if (after > before) {
        state.stableRounds = 0;
        logger.debug(`Round ${state.scrollCount}: ${after - before} new items (total ${after})`);
      } else {
        state.stableRounds++;
        logger.debug(
          `Round ${state.scrollCount}: no new items (${state.stableRounds}/${this.stabilityThreshold})`
        );
      }

      if (state.stableRounds >= this.stabilityThreshold) {
        return 'converged';
      }
      if (state.scrollCount >= maxScrollRounds) {
        return 'capped';
      }

      const position = await session.currentScrollPosition();
      if (position === lastPosition) {
        return 'at-bottom';
      }
      lastPosition = position;
    }
  }

  private async countFeedItems<H>(session: BrowserSession<H>): Promise<number> {
    const match = await locateFirstMatching(session, this.locators.thumbnail);
    return match?.handles.length ?? 0;
  }
}

function describeReason(
  reason: TerminationReason,
  state: FeedState,
  maxScrollRounds: number,
  stabilityThreshold: number
): string {
  switch (reason) {
    case 'converged':
      return `No new items for ${stabilityThreshold} consecutive rounds`;
    case 'capped':
      return `Reached max scroll rounds: ${maxScrollRounds}`;
    case 'at-bottom':
      return `Scroll position unchanged after round ${state.scrollCount}`;
    case 'aborted':
      return `Aborted after ${state.scrollCount} rounds`;
  }
}
