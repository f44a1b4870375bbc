/**
 * Tests for the streaming download module
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile, writeFile, mkdir, symlink } from 'node:fs/promises';
import { join } from 'node:path';
import {
  pageviewsUrl,
  streamDownload,
  downloadToFile,
  downloadPageviews,
} from '../../src/ingest/download.js';
import type { DownloadProgress } from '../../src/ingest/types.js';
import { validatePipelineConfig } from '../../src/lib/config-schema.js';
import { DownloadError } from '../../src/lib/errors.js';
import { partialPath, pathExists } from '../../src/lib/paths.js';
import { TEST_BUCKET, createTempDir } from '../helpers.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

function okResponse(body: ReadableStream<Uint8Array>, headers: Record<string, string> = {}) {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    body,
    headers: new Headers(headers),
  };
}

function errorResponse(status: number, statusText: string) {
  return {
    ok: false,
    status,
    statusText,
    body: null,
    headers: new Headers(),
  };
}

describe('pageviewsUrl', () => {
  it('should build the dump URL of a bucket', () => {
    expect(pageviewsUrl(TEST_BUCKET)).toBe(
      'https://dumps.wikimedia.org/other/pageviews/2025/2025-12/pageviews-20251217-160000.gz'
    );
  });

  it('should pad month, day and hour', () => {
    expect(pageviewsUrl({ year: 2024, month: 1, day: 2, hour: 3 })).toBe(
      'https://dumps.wikimedia.org/other/pageviews/2024/2024-01/pageviews-20240102-030000.gz'
    );
  });

  it('should accept a base URL with a trailing slash', () => {
    expect(pageviewsUrl(TEST_BUCKET, 'https://mirror.example.com/pageviews/')).toBe(
      'https://mirror.example.com/pageviews/2025/2025-12/pageviews-20251217-160000.gz'
    );
  });
});

describe('streamDownload', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should stream data from URL', async () => {
    const testData = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    mockFetch.mockResolvedValueOnce(okResponse(streamOf(testData), { 'Content-Length': '10' }));

    const stream = await streamDownload('https://example.com/file.gz');

    const reader = stream.getReader();
    const { value, done } = await reader.read();
    expect(done).toBe(false);
    expect(value).toEqual(testData);

    const { done: finalDone } = await reader.read();
    expect(finalDone).toBe(true);
  });

  it('should report progress', async () => {
    mockFetch.mockResolvedValueOnce(
      okResponse(streamOf(new Uint8Array([1, 2, 3, 4, 5]), new Uint8Array([6, 7, 8, 9, 10])), {
        'Content-Length': '10',
      })
    );

    const progressUpdates: DownloadProgress[] = [];
    const stream = await streamDownload('https://example.com/file.gz', {
      onProgress: (progress) => progressUpdates.push({ ...progress }),
    });

    const reader = stream.getReader();
    while (true) {
      const { done } = await reader.read();
      if (done) break;
    }

    // Final progress should show all bytes downloaded
    const lastProgress = progressUpdates[progressUpdates.length - 1];
    expect(lastProgress.bytesDownloaded).toBe(10);
    expect(lastProgress.totalBytes).toBe(10);
  });

  it('should retry network errors and give up after maxRetries', async () => {
    mockFetch.mockRejectedValue(new Error('Network error'));

    const error = await streamDownload('https://example.com/file.gz', {
      maxRetries: 3,
      retryDelayMs: 1,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ message: 'Download failed: Network error', stage: 'fetch' });
    expect(mockFetch).toHaveBeenCalledTimes(4);
  });

  it('should not retry after an abort', async () => {
    const controller = new AbortController();
    controller.abort();
    mockFetch.mockImplementation(() => {
      throw new DOMException('Aborted', 'AbortError');
    });

    await expect(
      streamDownload('https://example.com/file.gz', { signal: controller.signal, retryDelayMs: 1 })
    ).rejects.toThrow('Aborted');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should handle client errors (4xx) without retry', async () => {
    mockFetch.mockResolvedValueOnce(errorResponse(404, 'Not Found'));

    await expect(
      streamDownload('https://example.com/missing.gz', { maxRetries: 3, retryDelayMs: 1 })
    ).rejects.toThrow('Client error: 404 Not Found');

    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should handle server errors (5xx) with retry', async () => {
    mockFetch
      .mockResolvedValueOnce(errorResponse(500, 'Internal Server Error'))
      .mockResolvedValueOnce(errorResponse(503, 'Service Unavailable'))
      .mockResolvedValueOnce(okResponse(streamOf(new Uint8Array([1, 2, 3]))));

    const stream = await streamDownload('https://example.com/file.gz', {
      maxRetries: 3,
      retryDelayMs: 1,
    });

    expect(stream).toBeInstanceOf(ReadableStream);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('should fail on a missing body', async () => {
    mockFetch.mockResolvedValueOnce({ ...okResponse(streamOf()), body: null });

    await expect(
      streamDownload('https://example.com/file.gz', { maxRetries: 0 })
    ).rejects.toThrow('Response body is null');
  });
});

describe('downloadToFile', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    mockFetch.mockReset();
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should write the body to the output path', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(streamOf(new TextEncoder().encode('dump bytes'))));
    const path = join(dir, 'raw', 'file.gz');

    const result = await downloadToFile('https://example.com/file.gz', path);

    expect(result).toEqual({ path, status: 'created', bytes: 10 });
    expect(await readFile(path, 'utf-8')).toBe('dump bytes');
  });

  it('should skip the download when the file exists', async () => {
    const path = join(dir, 'file.gz');
    await writeFile(path, 'cached');

    const result = await downloadToFile('https://example.com/file.gz', path);

    expect(result).toEqual({ path, status: 'skipped', bytes: 6 });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should delete the partial file when the stream fails', async () => {
    let sent = false;
    const failing = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (!sent) {
          sent = true;
          controller.enqueue(new Uint8Array([1, 2, 3]));
          return;
        }
        controller.error(new Error('connection reset'));
      },
    });
    mockFetch.mockResolvedValueOnce(okResponse(failing));
    const path = join(dir, 'file.gz');

    await expect(downloadToFile('https://example.com/file.gz', path)).rejects.toThrow('connection reset');
    expect(await pathExists(path)).toBe(false);
  });

  it('should overwrite a stale staging file from an interrupted run', async () => {
    const path = join(dir, 'file.gz');
    await writeFile(partialPath(path), 'dump');
    mockFetch.mockResolvedValueOnce(okResponse(streamOf(new TextEncoder().encode('dump bytes'))));

    const result = await downloadToFile('https://example.com/file.gz', path);

    expect(result).toEqual({ path, status: 'created', bytes: 10 });
    expect(await readFile(path, 'utf-8')).toBe('dump bytes');
    expect(await pathExists(partialPath(path))).toBe(false);
  });

  it.skipIf(!existsSync('/dev/full'))('should cancel the response body when a write fails', async () => {
    const cancelled: unknown[] = [];
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new Uint8Array([1, 2, 3]));
      },
      cancel(reason) {
        cancelled.push(reason);
      },
    });
    mockFetch.mockResolvedValueOnce(okResponse(endless));
    const path = join(dir, 'file.gz');
    // Every write to /dev/full fails with ENOSPC
    await symlink('/dev/full', partialPath(path));

    await expect(downloadToFile('https://example.com/file.gz', path)).rejects.toMatchObject({ code: 'ENOSPC' });
    expect(cancelled).toHaveLength(1);
    expect(cancelled[0]).toMatchObject({ code: 'ENOSPC' });
    expect(await pathExists(path)).toBe(false);
    expect(await pathExists(partialPath(path))).toBe(false);
  });
});

describe('downloadPageviews', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    mockFetch.mockReset();
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should fetch the bucket URL into the raw directory', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(streamOf(new Uint8Array([31, 139]))));
    const config = validatePipelineConfig({ dataDir: dir });

    const result = await downloadPageviews(TEST_BUCKET, config);

    expect(mockFetch).toHaveBeenCalledWith(
      'https://dumps.wikimedia.org/other/pageviews/2025/2025-12/pageviews-20251217-160000.gz',
      {}
    );
    expect(result.path).toBe(join(dir, 'raw', 'pageviews-20251217-160000.gz'));
    expect(result.status).toBe('created');
  });

  it('should not fetch when the raw dump is already present', async () => {
    const config = validatePipelineConfig({ dataDir: dir });
    await mkdir(join(dir, 'raw'));
    await writeFile(join(dir, 'raw', 'pageviews-20251217-160000.gz'), 'x');

    const result = await downloadPageviews(TEST_BUCKET, config);

    expect(result.status).toBe('skipped');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should tag failures with the bucket and status', async () => {
    mockFetch.mockResolvedValueOnce(errorResponse(404, 'Not Found'));
    const config = validatePipelineConfig({ dataDir: dir });

    const error = await downloadPageviews(TEST_BUCKET, config).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ stage: 'fetch', bucket: '2025-12-17T16', status: 404 });
    expect(await pathExists(join(dir, 'raw', 'pageviews-20251217-160000.gz'))).toBe(false);
  });
});
