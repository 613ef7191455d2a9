/**
 * Path utilities and naming policy for the output directory
 * Defines the state directory layout and the content-addressed filename rule
 */

import { createHash, randomBytes } from 'crypto';
import { join } from 'path';

/**
 * Canonical output layout, relative to the output directory
 */
export const OUTPUT_LAYOUT = {
  /** Manifest and logs directory */
  STATE_DIR: '.feed-harvest',
  /** URL → filename index and run history */
  MANIFEST_FILE: '.feed-harvest/manifest.json',
  /** Failure reports and debug artifacts */
  LOGS_DIR: '.feed-harvest/logs',
} as const;

/** Length of the hex hash prefix used as filename stem */
export const FILENAME_HASH_LENGTH = 16;

/** Used when neither the URL nor the response says what the image is */
export const DEFAULT_IMAGE_EXTENSION = 'jpg';

const URL_EXTENSIONS: Record<string, string> = {
  jpg: 'jpg',
  jpeg: 'jpg',
  png: 'png',
  gif: 'gif',
  webp: 'webp',
  bmp: 'bmp',
  avif: 'avif',
  svg: 'svg',
};

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/pjpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/bmp': 'bmp',
  'image/avif': 'avif',
  'image/svg+xml': 'svg',
};

export function getStateDir(outputDir: string): string {
  return join(outputDir, OUTPUT_LAYOUT.STATE_DIR);
}

export function getManifestPath(outputDir: string): string {
  return join(outputDir, OUTPUT_LAYOUT.MANIFEST_FILE);
}

export function getLogsDir(outputDir: string): string {
  return join(outputDir, OUTPUT_LAYOUT.LOGS_DIR);
}

export function getMediaPath(outputDir: string, filename: string): string {
  return join(outputDir, filename);
}

/**
 * Unique sibling path for an atomic write (write here, then rename)
 */
export function getTempPath(targetPath: string): string {
  return `${targetPath}.${randomBytes(4).toString('hex')}.tmp`;
}

/**
 * Stable filename stem for a URL: first 16 hex chars of its SHA-256
 */
export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex').substring(0, FILENAME_HASH_LENGTH);
}

/**
 * Known image extension from the URL path, if any
 * @example extensionFromUrl('https://a.test/x/photo.JPEG?w=1') // 'jpg'
 */
export function extensionFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }

  const match = pathname.match(/\.([a-z0-9]{2,5})$/i);
  if (!match) {
    return undefined;
  }
  return URL_EXTENSIONS[match[1].toLowerCase()];
}

/**
 * Image extension for a Content-Type header value, parameters ignored
 */
export function extensionFromContentType(contentType: string | null | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mime];
}

/**
 * Deterministic, content-addressed media filename
 * Strategy:
 * 1. Stem is the URL hash, so the same URL always gets the same stem
 * 2. Extension from the URL path when it names a known image type
 * 3. Else from the response content type
 * 4. Else DEFAULT_IMAGE_EXTENSION
 */
export function generateMediaFilename(url: string, contentType?: string | null): string {
  const ext = extensionFromUrl(url) ?? extensionFromContentType(contentType) ?? DEFAULT_IMAGE_EXTENSION;
  return `${hashUrl(url)}.${ext}`;
}

/**
 * Stem of a media filename produced by generateMediaFilename, or undefined
 * for anything else in the directory
 */
export function stemOfMediaFilename(filename: string): string | undefined {
  const match = filename.match(new RegExp(`^([0-9a-f]{${FILENAME_HASH_LENGTH}})\\.([a-z0-9]{2,5})$`));
  return match ? match[1] : undefined;
}

/**
 * Validate that a filename is safe and within constraints
 */
export function isValidFilename(filename: string): boolean {
  if (filename.length === 0 || filename.length > 255) {
    return false;
  }

  if (!/^[a-z0-9._-]+$/i.test(filename)) {
    return false;
  }

  if (filename.includes('/') || filename.includes('\\') || filename.includes('..')) {
    return false;
  }

  return true;
}
