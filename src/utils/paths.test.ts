/**
 * Tests for path utilities and naming policy
 * Validates deterministic content-addressed names and extension inference
 */

import { join } from 'path';
import {
  extensionFromContentType,
  extensionFromUrl,
  generateMediaFilename,
  getLogsDir,
  getManifestPath,
  getMediaPath,
  getTempPath,
  hashUrl,
  isValidFilename,
  stemOfMediaFilename,
} from './paths';

describe('paths', () => {
  describe('hashUrl', () => {
    it('should return the first 16 hex chars of the SHA-256', () => {
      expect(hashUrl('https://img.example.test/a/photo.jpg')).toBe('3be935eb7c06cea6');
    });

    it('should be deterministic', () => {
      const url = 'https://img.example.test/b.png';
      expect(hashUrl(url)).toBe(hashUrl(url));
    });

    it('should differ for different URLs', () => {
      expect(hashUrl('https://img.example.test/a/photo')).not.toBe(
        hashUrl('https://img.example.test/a/photo.jpg')
      );
    });
  });

  describe('extensionFromUrl', () => {
    it('should read a known extension from the path', () => {
      expect(extensionFromUrl('https://img.example.test/b.png')).toBe('png');
    });

    it('should map jpeg to jpg and ignore case', () => {
      expect(extensionFromUrl('https://img.example.test/x/photo.JPEG?w=1')).toBe('jpg');
    });

    it('should ignore the query string', () => {
      expect(extensionFromUrl('https://img.example.test/thumb?file=x.png')).toBeUndefined();
    });

    it('should return undefined for unknown extensions', () => {
      expect(extensionFromUrl('https://img.example.test/page.html')).toBeUndefined();
    });

    it('should return undefined for unparseable input', () => {
      expect(extensionFromUrl('not a url')).toBeUndefined();
    });
  });

  describe('extensionFromContentType', () => {
    it('should map image types', () => {
      expect(extensionFromContentType('image/webp')).toBe('webp');
      expect(extensionFromContentType('image/svg+xml')).toBe('svg');
    });

    it('should ignore parameters and case', () => {
      expect(extensionFromContentType('Image/JPEG; charset=binary')).toBe('jpg');
    });

    it('should return undefined for missing or non-image types', () => {
      expect(extensionFromContentType(undefined)).toBeUndefined();
      expect(extensionFromContentType(null)).toBeUndefined();
      expect(extensionFromContentType('text/html')).toBeUndefined();
    });
  });

  describe('generateMediaFilename', () => {
    it('should prefer the URL extension over the content type', () => {
      expect(generateMediaFilename('https://img.example.test/a/photo.jpg', 'image/png')).toBe(
        '3be935eb7c06cea6.jpg'
      );
    });

    it('should fall back to the content type', () => {
      expect(generateMediaFilename('https://img.example.test/a/photo', 'image/png')).toBe(
        'ac62000b41bc20de.png'
      );
    });

    it('should default to jpg', () => {
      expect(generateMediaFilename('https://img.example.test/a/photo')).toBe('ac62000b41bc20de.jpg');
    });
  });

  describe('stemOfMediaFilename', () => {
    it('should return the hash stem of a generated name', () => {
      expect(stemOfMediaFilename('6bc372269e8ef392.png')).toBe('6bc372269e8ef392');
    });

    it('should ignore temp files and other names', () => {
      expect(stemOfMediaFilename('6bc372269e8ef392.png.a1b2c3d4.tmp')).toBeUndefined();
      expect(stemOfMediaFilename('manifest.json')).toBeUndefined();
      expect(stemOfMediaFilename('6BC372269E8EF392.png')).toBeUndefined();
    });
  });

  describe('isValidFilename', () => {
    it('should accept generated names', () => {
      expect(isValidFilename('3be935eb7c06cea6.jpg')).toBe(true);
    });

    it('should reject traversal and separators', () => {
      expect(isValidFilename('../escape.jpg')).toBe(false);
      expect(isValidFilename('a/b.jpg')).toBe(false);
      expect(isValidFilename('')).toBe(false);
    });
  });

  describe('layout paths', () => {
    it('should place state under .feed-harvest', () => {
      expect(getManifestPath('/out')).toBe(join('/out', '.feed-harvest', 'manifest.json'));
      expect(getLogsDir('/out')).toBe(join('/out', '.feed-harvest', 'logs'));
      expect(getMediaPath('/out', 'x.jpg')).toBe(join('/out', 'x.jpg'));
    });

    it('should create unique temp siblings', () => {
      const target = join('/out', 'x.jpg');
      const first = getTempPath(target);
      expect(first).toMatch(/^\/out\/x\.jpg\.[0-9a-f]{8}\.tmp$/);
      expect(getTempPath(target)).not.toBe(first);
    });
  });
});
