/**
 * Error taxonomy with stable exit codes
 * Each class extends HarvestError and provides:
 * - code: stable exit code (1-5)
 * - message: user-facing message
 * - details: optional verbose details
 */

import { getLogger } from './logger.js';

export abstract class HarvestError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: bad flags, invalid configuration, missing query image
 */
export class InvalidInputError extends HarvestError {
  readonly code = 1;

  static fromMissingImage(path: string): InvalidInputError {
    return new InvalidInputError(
      `Query image not found or not readable: "${path}"`,
      'Pass the path of an existing image file as the first argument'
    );
  }

  static fromNotAFile(path: string): InvalidInputError {
    return new InvalidInputError(
      `Query image path is not a file: "${path}"`,
      'Directories cannot be uploaded as a search query'
    );
  }

  static fromConfigIssues(issues: string[]): InvalidInputError {
    return new InvalidInputError(
      `Invalid configuration: ${issues.join('; ')}`,
      'Run with --help to see the accepted options'
    );
  }
}

/**
 * Session setup error (exit code 2)
 * Triggered by: browser launch failure, missing browser binaries
 */
export class SessionSetupError extends HarvestError {
  readonly code = 2;

  static fromLaunchFailure(reason: string): SessionSetupError {
    return new SessionSetupError(
      `Failed to start browser session: ${reason}`,
      'Install the browser with "npx playwright install chromium" and try again'
    );
  }
}

/**
 * Search submission error (exit code 3)
 * Triggered by: search page unreachable, upload control never found
 */
export class SearchSubmissionError extends HarvestError {
  readonly code = 3;

  static fromNavigationFailure(url: string, reason: string): SearchSubmissionError {
    return new SearchSubmissionError(
      `Could not open search page ${url}: ${reason}`,
      'Check your internet connection or pass a different --search-url'
    );
  }

  static fromMissingUploadControl(): SearchSubmissionError {
    return new SearchSubmissionError(
      'Image upload control not found on the search page. The page layout may have changed.',
      'None of the configured upload locators matched; update the locator table'
    );
  }

  static fromUploadFailure(path: string, reason: string): SearchSubmissionError {
    return new SearchSubmissionError(
      `Could not upload query image ${path}: ${reason}`,
      'Check that the file is a readable image and try again'
    );
  }
}

/**
 * Output directory error (exit code 4)
 * Triggered by: output directory cannot be created or is not a directory
 */
export class OutputDirectoryError extends HarvestError {
  readonly code = 4;

  static fromCreateFailure(path: string, reason: string): OutputDirectoryError {
    return new OutputDirectoryError(
      `Cannot create output directory "${path}": ${reason}`,
      'Check directory permissions and ensure the path is writable'
    );
  }
}

/**
 * Download error (exit code 5)
 * Triggered by: at least one URL failed to download
 */
export class DownloadError extends HarvestError {
  readonly code = 5;

  static fromPartialDownload(failed: number, attempted: number): DownloadError {
    return new DownloadError(
      `Download incomplete: ${failed}/${attempted} images failed.`,
      'Run the command again to resume; files already saved are skipped'
    );
  }
}

/**
 * Non-success HTTP response, carries the status for retry classification
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof HarvestError) {
    return error.getExitCode();
  }
  return 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof HarvestError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
