/**
 * Feed expansion types
 */

import type { LocatorTable } from './locators.js';

/**
 * Why an expansion stopped
 * - converged: no growth for `stabilityThreshold` consecutive rounds
 * - capped: reached maxScrollRounds
 * - at-bottom: scroll position did not move since the previous round
 * - aborted: the abort signal fired between rounds
 */
export type TerminationReason = 'converged' | 'capped' | 'at-bottom' | 'aborted';

/**
 * Mutable state owned by a single expand() call
 */
export interface FeedState {
  knownUrls: Set<string>;
  scrollCount: number;
  stableRounds: number;
  expandClicked: boolean;
}

export interface FeedExpanderOptions {
  /**
   * Consecutive rounds without growth before stopping
   * @default 3
   */
  stabilityThreshold?: number;

  /**
   * Pause after each scroll and after the load-more click (ms)
   * @default 2000
   */
  settleMs?: number;

  /**
   * Locator chains; only `loadMore`, `thumbnail` and `mediaAttributes` are used here
   * @default DEFAULT_LOCATORS
   */
  locators?: LocatorTable;

  /** Checked before every round */
  signal?: AbortSignal;
}

export interface FeedExpansion {
  urls: Set<string>;
  reason: TerminationReason;
  scrollCount: number;
  expandClicked: boolean;
  /** Locator that produced the final elements, null if none matched */
  matchedLocator: string | null;
}
