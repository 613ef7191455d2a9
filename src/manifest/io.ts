/**
 * Manifest IO operations: initialization, loading, atomic saving, and run recording
 */

import { mkdir, readFile, writeFile, rename } from 'fs/promises';
import { randomBytes } from 'crypto';
import { getLogger } from '../utils/logger.js';
import { getManifestPath, getStateDir } from '../utils/paths.js';
import {
  HarvestManifest,
  HarvestRun,
  HarvestRunStatus,
  MediaEntry,
  SCHEMA_VERSION,
  isValidHarvestManifest,
} from './types.js';

export function createEmptyManifest(): HarvestManifest {
  return {
    schemaVersion: SCHEMA_VERSION,
    entries: {},
    runs: [],
  };
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Load manifest from disk, or start a new one if missing
 * A corrupt or foreign manifest is replaced on the next save
 */
export async function loadManifest(outputDir: string): Promise<HarvestManifest> {
  const manifestPath = getManifestPath(outputDir);

  let content: string;
  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return createEmptyManifest();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().warn(`Ignoring unreadable manifest at ${manifestPath}: ${message}`);
    return createEmptyManifest();
  }

  if (!isValidHarvestManifest(parsed)) {
    getLogger().warn(`Ignoring manifest with unexpected structure at ${manifestPath}`);
    return createEmptyManifest();
  }

  return parsed;
}

/**
 * Save manifest atomically: write to temp file, then rename
 */
export async function saveManifestAtomic(
  outputDir: string,
  manifest: HarvestManifest
): Promise<void> {
  const manifestPath = getManifestPath(outputDir);
  const tempPath = `${manifestPath}.tmp`;

  await mkdir(getStateDir(outputDir), { recursive: true });

  await writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8');
  await rename(tempPath, manifestPath);
}

/**
 * Unique run ID (timestamp + random suffix)
 */
export function generateRunId(): string {
  return `${Date.now()}-${randomBytes(4).toString('hex')}`;
}

export function recordEntry(manifest: HarvestManifest, url: string, entry: MediaEntry): void {
  manifest.entries[url] = entry;
}

/**
 * Record the start of a run; counts are filled in by recordRunFinish
 */
export function recordRunStart(manifest: HarvestManifest, runId: string, source?: string): HarvestRun {
  const run: HarvestRun = {
    run_id: runId,
    ts: new Date().toISOString(),
    attempted: 0,
    succeeded: 0,
    skipped: 0,
    failed: 0,
    status: 'success',
  };
  if (source !== undefined) {
    run.source = source;
  }

  manifest.runs.push(run);
  return run;
}

export function recordRunFinish(
  manifest: HarvestManifest,
  runId: string,
  counts: { attempted: number; succeeded: number; skipped: number; failed: number },
  status: HarvestRunStatus
): void {
  const run = manifest.runs.find((r) => r.run_id === runId);

  if (!run) {
    throw new Error(`Run ${runId} not found in manifest`);
  }

  run.attempted = counts.attempted;
  run.succeeded = counts.succeeded;
  run.skipped = counts.skipped;
  run.failed = counts.failed;
  run.status = status;
}
