/**
 * Browser capability consumed by the query, feed and orchestration code
 */

import type { CapturedArtifacts } from '../utils/artifacts.js';

/**
 * An exclusively-owned, driven browser page. Handles are opaque element
 * references produced by findElements and only meaningful to the same session.
 * Every locator-chain decision lives with the caller; the session only runs
 * single locators.
 */
export interface BrowserSession<H> {
  navigate(url: string): Promise<void>;
  /** Set the given file input's value to a local file */
  uploadFile(input: H, filePath: string): Promise<void>;
  /** All elements matching one locator string; may throw on a malformed locator */
  findElements(locator: string): Promise<H[]>;
  isVisible(handle: H): Promise<boolean>;
  readAttribute(handle: H, name: string): Promise<string | null>;
  click(handle: H): Promise<void>;
  scrollToBottom(): Promise<void>;
  /** Vertical scroll offset of the page after the last scroll */
  currentScrollPosition(): Promise<number>;
  /** Address of the current page, used to resolve relative links */
  currentUrl(): Promise<string>;
  /** Idempotent */
  close(): Promise<void>;
  /** Save a screenshot and HTML snapshot of the current page, where the session supports it */
  captureArtifacts?(outputDir: string, phase: string, runId: string): Promise<CapturedArtifacts | null>;
}

export interface SessionOptions {
  headless?: boolean;
  userAgent?: string;
  navigationTimeoutMs?: number;
  /** Timeout for single element actions such as click */
  actionTimeoutMs?: number;
}
