/**
 * Failure report writer for download failures
 * Writes JSON report to <outputDir>/.feed-harvest/logs/download-failures-<runId>.json
 * Includes manual recovery guidance per failure
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { getLogger } from '../utils/logger.js';
import { getLogsDir } from '../utils/paths.js';
import type { FailedRecord, RunSummary } from './types.js';

export interface FailureEntry {
  url: string;
  targetPath: string;
  status?: number;
  errorMessage: string;
  timestamp: string;
  manualRecovery: string[];
}

export interface FailureSummary {
  attempted: number;
  succeeded: number;
  skipped: number;
  failed: number;
  /** failed / attempted, 0 when nothing was attempted */
  failRate: number;
}

export interface FailureReport {
  runId: string;
  timestamp: string;
  summary: FailureSummary;
  failures: FailureEntry[];
}

export function getFailureReportPath(outputDir: string, runId: string): string {
  return join(getLogsDir(outputDir), `download-failures-${runId}.json`);
}

export function toFailureSummary(summary: RunSummary): FailureSummary {
  const { attempted, succeeded, skipped, failed } = summary;
  return {
    attempted,
    succeeded,
    skipped,
    failed,
    failRate: attempted > 0 ? failed / attempted : 0,
  };
}

/**
 * Generate manual recovery guidance for a failed download
 */
export function generateManualRecovery(failure: Pick<FailureEntry, 'url' | 'status'>): string[] {
  const guidance: string[] = [];

  guidance.push(`Open URL in browser: ${failure.url}`);

  if (failure.status === 403 || failure.status === 401) {
    guidance.push('The host refused the request; save the image from the browser instead');
  } else if (failure.status === 404 || failure.status === 410) {
    guidance.push('The image is gone from the host; it cannot be recovered from this URL');
  } else {
    guidance.push('Re-run the same command to retry; images already saved are skipped');
  }

  return guidance;
}

export function toFailureEntry(record: FailedRecord, timestamp: string = new Date().toISOString()): FailureEntry {
  const entry: FailureEntry = {
    url: record.url,
    targetPath: record.targetPath,
    errorMessage: record.errorDetail,
    timestamp,
    manualRecovery: generateManualRecovery(record),
  };
  if (record.status !== undefined) {
    entry.status = record.status;
  }
  return entry;
}

/**
 * Write a JSON failure report when downloads fail
 * Write errors are logged, not thrown
 *
 * @returns Report path, or null if the write failed
 */
export async function writeFailureReport(
  outputDir: string,
  runId: string,
  summary: FailureSummary,
  failures: FailureEntry[]
): Promise<string | null> {
  const logger = getLogger();

  try {
    await mkdir(getLogsDir(outputDir), { recursive: true });

    const reportPath = getFailureReportPath(outputDir, runId);
    const report: FailureReport = {
      runId,
      timestamp: new Date().toISOString(),
      summary,
      failures,
    };

    await writeFile(reportPath, JSON.stringify(report, null, 2), 'utf-8');

    logger.debug(`Failure report written: ${reportPath}`);
    return reportPath;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to write failure report: ${errorMessage}`);
    return null;
  }
}
