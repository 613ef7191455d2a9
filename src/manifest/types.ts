/**
 * Manifest schema types and versioning
 * Stored at <outputDir>/.feed-harvest/manifest.json
 */

/**
 * Schema version constant - increment when manifest structure changes
 */
export const SCHEMA_VERSION = '1.0.0';

/**
 * One downloaded media file, keyed by source URL in HarvestManifest.entries
 */
export interface MediaEntry {
  /** Filename inside the output directory */
  filename: string;
  /** Content-Type reported by the server (if any) */
  content_type?: string;
  /** File size in bytes */
  size_bytes: number;
  /** When the file was written or first indexed (ISO 8601) */
  downloaded_at: string;
}

export type HarvestRunStatus = 'success' | 'partial' | 'failed' | 'aborted';

export interface HarvestRun {
  run_id: string;
  /** Run start timestamp (ISO 8601) */
  ts: string;
  /** What produced the URL set, usually the query image path */
  source?: string;
  attempted: number;
  succeeded: number;
  skipped: number;
  failed: number;
  status: HarvestRunStatus;
}

export interface HarvestManifest {
  schemaVersion: string;
  /** Source URL → media entry */
  entries: Record<string, MediaEntry>;
  runs: HarvestRun[];
}

const RUN_STATUSES: readonly string[] = ['success', 'partial', 'failed', 'aborted'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidMediaEntry(value: unknown): value is MediaEntry {
  if (!isRecord(value)) return false;

  return (
    typeof value.filename === 'string' &&
    typeof value.size_bytes === 'number' &&
    typeof value.downloaded_at === 'string' &&
    (value.content_type === undefined || typeof value.content_type === 'string')
  );
}

export function isValidHarvestRun(value: unknown): value is HarvestRun {
  if (!isRecord(value)) return false;

  return (
    typeof value.run_id === 'string' &&
    typeof value.ts === 'string' &&
    (value.source === undefined || typeof value.source === 'string') &&
    typeof value.attempted === 'number' &&
    typeof value.succeeded === 'number' &&
    typeof value.skipped === 'number' &&
    typeof value.failed === 'number' &&
    typeof value.status === 'string' &&
    RUN_STATUSES.includes(value.status)
  );
}

/**
 * Type guard: check if value is a valid HarvestManifest
 * Lightweight runtime validation without external dependencies
 */
export function isValidHarvestManifest(value: unknown): value is HarvestManifest {
  if (!isRecord(value)) return false;

  if (typeof value.schemaVersion !== 'string') return false;

  const { entries, runs } = value;
  if (!isRecord(entries) || !Object.values(entries).every(isValidMediaEntry)) {
    return false;
  }

  return Array.isArray(runs) && runs.every(isValidHarvestRun);
}
