/**
 * Image downloader with content-addressed filenames and resumable runs
 * - Saves each URL to <outputDir>/<sha256(url)[0:16]>.<ext>
 * - Skips URLs whose file already exists (manifest entry or matching stem)
 * - Writes atomically (.tmp → rename), never leaves a partial file under the final name
 * - One failed URL never aborts the batch
 * - Sequential by default, optional bounded worker pool
 */

import { mkdir, readdir, rename, stat, unlink, writeFile } from 'fs/promises';
import { getLogger } from '../utils/logger.js';
import { HttpStatusError, OutputDirectoryError, errorMessage } from '../utils/errors.js';
import { RetryError, RetryOptions, retry } from '../utils/retry.js';
import { fixedDelay, rateLimit } from '../utils/ratelimit.js';
import {
  generateMediaFilename,
  getMediaPath,
  getTempPath,
  hashUrl,
  isValidFilename,
  stemOfMediaFilename,
} from '../utils/paths.js';
import {
  generateRunId,
  loadManifest,
  recordEntry,
  recordRunFinish,
  recordRunStart,
  saveManifestAtomic,
} from '../manifest/io.js';
import type { HarvestManifest, HarvestRunStatus } from '../manifest/types.js';
import { browserRequestHeaders } from './headers.js';
import { toFailureEntry, toFailureSummary, writeFailureReport } from './failure-report.js';
import type {
  DownloadOptions,
  DownloadRecord,
  DownloadRun,
  FailedRecord,
  RunSummary,
} from './types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;
export const DEFAULT_DOWNLOAD_DELAY_MS = 100;

const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
  jitterMaxMs: 250,
};

interface ExistingFile {
  filename: string;
  sizeBytes: number;
}

interface FetchedImage {
  body: Buffer;
  contentType?: string;
}

/**
 * Always recomputed from the records, so the counts add up by construction
 */
export function summarizeRecords(
  records: readonly DownloadRecord[],
  outputDir: string,
  aborted: boolean = false
): RunSummary {
  let succeeded = 0;
  let skipped = 0;
  let failed = 0;

  for (const record of records) {
    switch (record.outcome) {
      case 'success':
        succeeded++;
        break;
      case 'skipped-duplicate':
        skipped++;
        break;
      case 'failed':
        failed++;
        break;
    }
  }

  return { attempted: records.length, succeeded, skipped, failed, outputDir, aborted };
}

function runStatus(summary: RunSummary): HarvestRunStatus {
  if (summary.aborted) return 'aborted';
  if (summary.failed === 0) return 'success';
  if (summary.succeeded + summary.skipped === 0) return 'failed';
  return 'partial';
}

/**
 * Create the output directory (idempotent)
 * @throws OutputDirectoryError when it cannot be created
 */
export async function ensureOutputDir(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw OutputDirectoryError.fromCreateFailure(outputDir, errorMessage(error));
  }
}

/**
 * Size of a non-empty regular file, or null
 */
async function nonEmptyFileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.isFile() && stats.size > 0 ? stats.size : null;
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      getLogger().debug(`File check failed for ${path}: ${errorMessage(error)}`);
    }
    return null;
  }
}

/**
 * Hash stem → filename for every media file already in the directory
 */
async function indexExistingFiles(outputDir: string): Promise<Map<string, string>> {
  const byStem = new Map<string, string>();
  for (const name of await readdir(outputDir)) {
    const stem = stemOfMediaFilename(name);
    if (stem) {
      byStem.set(stem, name);
    }
  }
  return byStem;
}

async function writeFileAtomic(targetPath: string, body: Buffer): Promise<void> {
  const tempPath = getTempPath(targetPath);
  try {
    await writeFile(tempPath, body);
    await rename(tempPath, targetPath);
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      getLogger().debug(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    }
    throw error;
  }
}

function describeFailure(error: unknown): { detail: string; status?: number } {
  const cause = error instanceof RetryError ? error.lastError : error;
  const status = cause instanceof HttpStatusError ? cause.status : undefined;
  return { detail: errorMessage(error), status };
}

export class DownloadManager {
  private readonly requestTimeoutMs: number;
  private readonly delayMs: number;
  private readonly concurrency: number;
  private readonly retryOptions: RetryOptions;
  private readonly headers: Record<string, string>;
  private readonly source?: string;
  private readonly signal?: AbortSignal;

  constructor(options: DownloadOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.delayMs = options.delayMs ?? DEFAULT_DOWNLOAD_DELAY_MS;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.retryOptions = { ...DEFAULT_RETRY, ...options.retry, operationName: 'download' };
    this.headers = browserRequestHeaders(options.userAgent, options.headers);
    this.source = options.source;
    this.signal = options.signal;
  }

  /**
   * Download every distinct URL into outputDir.
   * Re-running with the same URLs and directory performs no network I/O for
   * URLs that already succeeded.
   *
   * @throws OutputDirectoryError when outputDir cannot be created
   */
  async download(urls: Iterable<string>, outputDir: string): Promise<DownloadRun> {
    const logger = getLogger();
    const queue = [...new Set(urls)];

    await ensureOutputDir(outputDir);

    const manifest = await loadManifest(outputDir);
    const existingStems = await indexExistingFiles(outputDir);
    const runId = generateRunId();
    recordRunStart(manifest, runId, this.source);

    logger.phaseStart('Download');
    logger.info(`Starting download of ${queue.length} images to ${outputDir}`);

    const slots = new Array<DownloadRecord | undefined>(queue.length);
    let next = 0;
    let completed = 0;
    let aborted = this.signal?.aborted ?? false;

    const worker = async (): Promise<void> => {
      let first = true;
      while (next < queue.length) {
        if (this.signal?.aborted) {
          aborted = true;
          return;
        }

        const index = next++;
        const url = queue[index];
        const run = () => this.processUrl(url, outputDir, manifest, existingStems);
        slots[index] = first ? await run() : await rateLimit(run, fixedDelay(this.delayMs));
        first = false;

        completed++;
        logger.progress({ phase: 'Download', current: completed, total: queue.length });
      }
    };

    const workerCount = Math.min(this.concurrency, Math.max(queue.length, 1));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const records = slots.filter((record): record is DownloadRecord => record !== undefined);
    const summary = summarizeRecords(records, outputDir, aborted);

    recordRunFinish(manifest, runId, summary, runStatus(summary));
    try {
      await saveManifestAtomic(outputDir, manifest);
    } catch (error) {
      logger.warn(`Failed to save manifest: ${errorMessage(error)}`);
    }

    const failures = records.filter((record): record is FailedRecord => record.outcome === 'failed');
    if (failures.length > 0) {
      const reportPath = await writeFailureReport(
        outputDir,
        runId,
        toFailureSummary(summary),
        failures.map((record) => toFailureEntry(record))
      );
      if (reportPath) {
        logger.info(`Failure report: ${reportPath}`);
      }
    }

    if (aborted) {
      logger.warn(`Download aborted after ${summary.attempted}/${queue.length} images`);
    }

    logger.phaseComplete(
      'Download',
      `${summary.succeeded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`
    );

    return { runId, summary, records };
  }

  private async processUrl(
    url: string,
    outputDir: string,
    manifest: HarvestManifest,
    existingStems: Map<string, string>
  ): Promise<DownloadRecord> {
    const logger = getLogger();

    const existing = await this.findExistingFile(url, outputDir, manifest, existingStems);
    if (existing) {
      if (!manifest.entries[url]) {
        recordEntry(manifest, url, {
          filename: existing.filename,
          size_bytes: existing.sizeBytes,
          downloaded_at: new Date().toISOString(),
        });
      }
      logger.debug(`Skipping (already saved): ${existing.filename}`);
      return { url, targetPath: getMediaPath(outputDir, existing.filename), outcome: 'skipped-duplicate' };
    }

    try {
      const { body, contentType } = await this.fetchImage(url);

      const filename = generateMediaFilename(url, contentType);
      const targetPath = getMediaPath(outputDir, filename);
      await writeFileAtomic(targetPath, body);

      recordEntry(manifest, url, {
        filename,
        content_type: contentType,
        size_bytes: body.length,
        downloaded_at: new Date().toISOString(),
      });
      logger.debug(`Saved ${filename} (${body.length} bytes)`);

      return { url, targetPath, outcome: 'success', sizeBytes: body.length, contentType };
    } catch (error) {
      const { detail, status } = describeFailure(error);
      logger.warn(`Failed to download ${url}: ${detail}`);

      const failed: FailedRecord = {
        url,
        targetPath: getMediaPath(outputDir, generateMediaFilename(url)),
        outcome: 'failed',
        errorDetail: detail,
      };
      if (status !== undefined) {
        failed.status = status;
      }
      return failed;
    }
  }

  private async findExistingFile(
    url: string,
    outputDir: string,
    manifest: HarvestManifest,
    existingStems: Map<string, string>
  ): Promise<ExistingFile | null> {
    const candidates: string[] = [];

    const entry = manifest.entries[url];
    if (entry && isValidFilename(entry.filename)) {
      candidates.push(entry.filename);
    }
    const byStem = existingStems.get(hashUrl(url));
    if (byStem && !candidates.includes(byStem)) {
      candidates.push(byStem);
    }

    for (const filename of candidates) {
      const sizeBytes = await nonEmptyFileSize(getMediaPath(outputDir, filename));
      if (sizeBytes !== null) {
        return { filename, sizeBytes };
      }
    }
    return null;
  }

  private async fetchImage(url: string): Promise<FetchedImage> {
    const fetched = await retry(async () => {
      const response = await fetch(url, {
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText);
      }

      const body = Buffer.from(await response.arrayBuffer());
      const contentType = response.headers.get('content-type') ?? undefined;
      return { body, contentType };
    }, this.retryOptions);

    if (fetched.body.length === 0) {
      throw new Error('Downloaded file is empty (0 bytes)');
    }

    return fetched;
  }
}
