/**
 * Artifact capture utility for debugging Playwright failures
 * Saves screenshot and HTML snapshots when query submission or feed expansion fails
 */

import type { Page } from 'playwright';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { getLogger } from './logger.js';
import { getLogsDir } from './paths.js';

export interface CapturedArtifacts {
  screenshotPath: string;
  htmlPath: string;
}

/**
 * Capture screenshot and HTML snapshot into <outputDir>/.feed-harvest/logs/
 *
 * @param phase - Phase name (e.g., 'search', 'feed')
 * @param runId - Run identifier for grouping artifacts
 * @returns Paths of captured artifacts, or null if capture failed
 */
export async function captureArtifacts(
  page: Page,
  outputDir: string,
  phase: string,
  runId: string
): Promise<CapturedArtifacts | null> {
  const logger = getLogger();

  try {
    const logsDir = getLogsDir(outputDir);
    await mkdir(logsDir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5);
    const baseFilename = `${phase}-${runId}-${timestamp}`;

    const screenshotPath = join(logsDir, `${baseFilename}.png`);
    await page.screenshot({ path: screenshotPath, fullPage: true });

    const htmlPath = join(logsDir, `${baseFilename}.html`);
    await writeFile(htmlPath, await page.content(), 'utf-8');

    logger.debug(`Artifacts captured: ${screenshotPath}, ${htmlPath}`);

    return { screenshotPath, htmlPath };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to capture artifacts: ${errorMessage}`);
    return null;
  }
}
