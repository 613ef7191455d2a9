/**
 * Tests for the download manager against an in-process HTTP server
 * Covers naming, idempotent re-runs, partial failures, timeouts, and the summary invariant
 */

import * as fs from 'fs/promises';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { loadManifest } from '../manifest/io';
import { OutputDirectoryError } from '../utils/errors';
import { hashUrl } from '../utils/paths';
import { DownloadManager, summarizeRecords } from './downloader';
import { getFailureReportPath } from './failure-report';
import type { DownloadOptions, RunSummary } from './types';

describe('DownloadManager', () => {
  let server: http.Server;
  let baseUrl: string;
  const hits = new Map<string, number>();
  const userAgents: string[] = [];

  let tempDir: string;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const route = req.url ?? '/';
      const count = (hits.get(route) ?? 0) + 1;
      hits.set(route, count);
      userAgents.push(req.headers['user-agent'] ?? '');

      const image = route.match(/^\/img\/(\w+)\.(jpg|png)$/);
      if (image) {
        res.writeHead(200, { 'Content-Type': image[2] === 'png' ? 'image/png' : 'image/jpeg' });
        res.end(`image-${image[1]}`);
        return;
      }

      switch (route) {
        case '/noext':
          res.writeHead(200, { 'Content-Type': 'image/webp' });
          res.end('webp-bytes');
          return;
        case '/empty.jpg':
          res.writeHead(200, { 'Content-Type': 'image/jpeg' });
          res.end();
          return;
        case '/flaky.jpg':
          if (count === 1) {
            res.writeHead(503);
            res.end();
          } else {
            res.writeHead(200, { 'Content-Type': 'image/jpeg' });
            res.end('recovered');
          }
          return;
        case '/hang.jpg':
          return;
        default:
          res.writeHead(404);
          res.end();
      }
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(async () => {
    hits.clear();
    userAgents.length = 0;
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'downloader-test-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const url = (route: string) => `${baseUrl}${route}`;
  const manager = (options: DownloadOptions = {}) =>
    new DownloadManager({ delayMs: 0, retry: { maxAttempts: 1 }, ...options });
  const mediaFiles = async () => (await fs.readdir(tempDir)).filter((name) => !name.startsWith('.')).sort();
  const expectInvariant = (summary: RunSummary) =>
    expect(summary.attempted).toBe(summary.succeeded + summary.skipped + summary.failed);

  it('should save each URL under its content-addressed name', async () => {
    const urls = [url('/img/1.jpg'), url('/img/2.png'), url('/noext')];

    const { summary, records } = await manager().download(urls, tempDir);

    expect(summary).toEqual({
      attempted: 3,
      succeeded: 3,
      skipped: 0,
      failed: 0,
      outputDir: tempDir,
      aborted: false,
    });
    expect(await mediaFiles()).toEqual(
      [`${hashUrl(urls[0])}.jpg`, `${hashUrl(urls[1])}.png`, `${hashUrl(urls[2])}.webp`].sort()
    );
    expect(await fs.readFile(path.join(tempDir, `${hashUrl(urls[0])}.jpg`), 'utf-8')).toBe('image-1');
    expect(records[2]).toEqual({
      url: urls[2],
      targetPath: path.join(tempDir, `${hashUrl(urls[2])}.webp`),
      outcome: 'success',
      sizeBytes: 10,
      contentType: 'image/webp',
    });
  });

  it('should record saved files in the manifest', async () => {
    const target = url('/img/1.jpg');

    const { runId } = await manager({ source: '/tmp/query.png' }).download([target], tempDir);
    const manifest = await loadManifest(tempDir);

    expect(manifest.entries[target]).toMatchObject({
      filename: `${hashUrl(target)}.jpg`,
      content_type: 'image/jpeg',
      size_bytes: 7,
    });
    expect(manifest.runs).toHaveLength(1);
    expect(manifest.runs[0]).toMatchObject({
      run_id: runId,
      source: '/tmp/query.png',
      attempted: 1,
      succeeded: 1,
      status: 'success',
    });
  });

  it('should skip everything on a second run without network traffic', async () => {
    const urls = [url('/img/1.jpg'), url('/img/2.png')];
    await manager().download(urls, tempDir);
    const filesAfterFirst = await mediaFiles();
    hits.clear();

    const { summary, records } = await manager().download(urls, tempDir);

    expect(summary).toMatchObject({ attempted: 2, succeeded: 0, skipped: 2, failed: 0 });
    expect(records.map((record) => record.outcome)).toEqual(['skipped-duplicate', 'skipped-duplicate']);
    expect(hits.size).toBe(0);
    expect(await mediaFiles()).toEqual(filesAfterFirst);
  });

  it('should skip a file already on disk even without a manifest entry', async () => {
    const target = url('/img/3.jpg');
    const existing = `${hashUrl(target)}.png`;
    await fs.writeFile(path.join(tempDir, existing), 'older copy');

    const { summary, records } = await manager().download([target], tempDir);

    expect(summary.skipped).toBe(1);
    expect(records[0].targetPath).toBe(path.join(tempDir, existing));
    expect(hits.size).toBe(0);
    expect((await loadManifest(tempDir)).entries[target]).toMatchObject({ filename: existing, size_bytes: 10 });
  });

  it('should re-download over an empty file', async () => {
    const target = url('/img/4.jpg');
    await fs.writeFile(path.join(tempDir, `${hashUrl(target)}.jpg`), '');

    const { summary } = await manager().download([target], tempDir);

    expect(summary.succeeded).toBe(1);
    expect(await fs.readFile(path.join(tempDir, `${hashUrl(target)}.jpg`), 'utf-8')).toBe('image-4');
  });

  it('should count duplicate input URLs once', async () => {
    const target = url('/img/5.jpg');

    const { summary } = await manager().download([target, target, target], tempDir);

    expect(summary).toMatchObject({ attempted: 1, succeeded: 1 });
    expect(hits.get('/img/5.jpg')).toBe(1);
  });

  it('should isolate a failed URL and write a failure report', async () => {
    const missing = url('/missing.jpg');
    const urls = [url('/img/1.jpg'), missing, url('/img/2.jpg')];

    const { runId, summary, records } = await manager().download(urls, tempDir);

    expect(summary).toMatchObject({ attempted: 3, succeeded: 2, skipped: 0, failed: 1 });
    expectInvariant(summary);
    expect(records[1]).toEqual({
      url: missing,
      targetPath: path.join(tempDir, `${hashUrl(missing)}.jpg`),
      outcome: 'failed',
      errorDetail: 'Failed after 1 attempt(s): HTTP 404: Not Found',
      status: 404,
    });
    expect(await mediaFiles()).toHaveLength(2);

    const report = JSON.parse(await fs.readFile(getFailureReportPath(tempDir, runId), 'utf-8'));
    expect(report.summary).toEqual({ attempted: 3, succeeded: 2, skipped: 0, failed: 1, failRate: 1 / 3 });
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].manualRecovery).toEqual([
      `Open URL in browser: ${missing}`,
      'The image is gone from the host; it cannot be recovered from this URL',
    ]);
    expect((await loadManifest(tempDir)).runs[0].status).toBe('partial');
  });

  it('should fail a URL whose file cannot be written and continue the batch', async () => {
    const urls = [url('/img/1.jpg'), url('/img/2.jpg'), url('/img/3.jpg')];
    const blocked = `${hashUrl(urls[1])}.jpg`;
    await fs.mkdir(path.join(tempDir, blocked));

    const { summary, records } = await manager().download(urls, tempDir);

    expect(summary).toMatchObject({ attempted: 3, succeeded: 2, skipped: 0, failed: 1 });
    expectInvariant(summary);
    expect(records.map((record) => record.outcome)).toEqual(['success', 'failed', 'success']);
    expect(records[1]).toMatchObject({ url: urls[1], targetPath: path.join(tempDir, blocked) });
    expect(await mediaFiles()).toEqual(
      [`${hashUrl(urls[0])}.jpg`, blocked, `${hashUrl(urls[2])}.jpg`].sort()
    );
    expect((await loadManifest(tempDir)).entries[urls[1]]).toBeUndefined();
  });

  it('should finish a batch when one request times out', async () => {
    const urls = [url('/img/1.jpg'), url('/img/2.jpg'), url('/hang.jpg'), url('/img/4.jpg'), url('/img/5.jpg')];

    const { summary, records } = await manager({ requestTimeoutMs: 200 }).download(urls, tempDir);

    expect(summary).toMatchObject({ attempted: 5, succeeded: 4, skipped: 0, failed: 1 });
    expect(records[2].outcome).toBe('failed');
    expect(await mediaFiles()).toHaveLength(4);
  });

  it('should fail an empty response without leaving a file', async () => {
    const { summary, records } = await manager().download([url('/empty.jpg')], tempDir);

    expect(summary.failed).toBe(1);
    expect(records[0]).toMatchObject({ outcome: 'failed', errorDetail: 'Downloaded file is empty (0 bytes)' });
    expect(await mediaFiles()).toEqual([]);
  });

  it('should retry a transient server error', async () => {
    const { summary } = await manager({ retry: { maxAttempts: 2, baseDelayMs: 0, jitterMaxMs: 0 } }).download(
      [url('/flaky.jpg')],
      tempDir
    );

    expect(summary.succeeded).toBe(1);
    expect(hits.get('/flaky.jpg')).toBe(2);
  });

  it('should send the configured user agent', async () => {
    await manager({ userAgent: 'feed-harvest-test/1.0' }).download([url('/img/1.jpg')], tempDir);

    expect(userAgents).toEqual(['feed-harvest-test/1.0']);
  });

  it('should keep input order with several workers', async () => {
    const urls = [1, 2, 3, 4, 5, 6].map((n) => url(`/img/${n}.jpg`));

    const { summary, records } = await manager({ concurrency: 3 }).download(urls, tempDir);

    expect(summary.succeeded).toBe(6);
    expect(records.map((record) => record.url)).toEqual(urls);
  });

  it('should stop taking URLs once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const { summary } = await manager({ signal: controller.signal }).download(
      [url('/img/1.jpg'), url('/img/2.jpg')],
      tempDir
    );

    expect(summary).toMatchObject({ attempted: 0, succeeded: 0, skipped: 0, failed: 0, aborted: true });
    expect(hits.size).toBe(0);
    expect((await loadManifest(tempDir)).runs[0].status).toBe('aborted');
  });

  it('should succeed with nothing to do', async () => {
    const { summary } = await manager().download([], tempDir);

    expect(summary).toMatchObject({ attempted: 0, succeeded: 0, skipped: 0, failed: 0, aborted: false });
  });

  it('should reject an output directory that cannot be created', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'file');

    await expect(manager().download([url('/img/1.jpg')], path.join(blocker, 'out'))).rejects.toThrow(
      OutputDirectoryError
    );
  });
});

describe('summarizeRecords', () => {
  it('should derive every count from the records', () => {
    const summary = summarizeRecords(
      [
        { url: 'a', targetPath: '/o/a.jpg', outcome: 'success', sizeBytes: 1 },
        { url: 'b', targetPath: '/o/b.jpg', outcome: 'skipped-duplicate' },
        { url: 'c', targetPath: '/o/c.jpg', outcome: 'failed', errorDetail: 'x' },
        { url: 'd', targetPath: '/o/d.jpg', outcome: 'failed', errorDetail: 'y' },
      ],
      '/o'
    );

    expect(summary).toEqual({ attempted: 4, succeeded: 1, skipped: 1, failed: 2, outputDir: '/o', aborted: false });
  });
});
