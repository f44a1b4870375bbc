/**
 * Streaming HTTP download of hourly pageview dumps, with progress tracking
 * and retries
 */

import { mkdir, open, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TransformStream, type ReadableStream } from 'node:stream/web';
import type { PipelineConfig } from '../lib/config-schema.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  PAGEVIEWS_BASE_URL,
  PROGRESS_INTERVAL_MS,
} from '../lib/constants.js';
import { DownloadError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { fileSize, partialPath, promotePartial, rawDumpPath } from '../lib/paths.js';
import { dumpStem, formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import type { DownloadOptions, DownloadProgress, StageResult } from './types.js';

/**
 * URL of the hourly dump for a bucket
 *
 * @example
 * ```typescript
 * pageviewsUrl({ year: 2025, month: 12, day: 17, hour: 16 });
 * // 'https://dumps.wikimedia.org/other/pageviews/2025/2025-12/pageviews-20251217-160000.gz'
 * ```
 */
export function pageviewsUrl(bucket: TimeBucket, baseUrl: string = PAGEVIEWS_BASE_URL): string {
  const month = String(bucket.month).padStart(2, '0');
  return `${baseUrl.replace(/\/+$/, '')}/${bucket.year}/${bucket.year}-${month}/${dumpStem(bucket)}.gz`;
}

/**
 * Stream download from a URL with progress tracking and retries.
 *
 * Network failures and 5xx responses are retried with exponential backoff;
 * 4xx responses fail immediately.
 *
 * @returns A ReadableStream of the downloaded bytes
 * @throws {DownloadError} After the last failed attempt
 */
export async function streamDownload(
  url: string,
  options: DownloadOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const {
    onProgress,
    signal,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
  } = options;
  const log = loggers.fetch;

  let attempt = 0;
  let lastError: DownloadError | undefined;

  while (attempt <= maxRetries) {
    try {
      return await attemptDownload(url, onProgress, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      lastError =
        error instanceof DownloadError
          ? error
          : new DownloadError(`Download failed: ${errorMessage(error)}`, { stage: 'fetch', cause: error });

      if (!lastError.retryable) {
        throw lastError;
      }

      attempt++;
      if (attempt <= maxRetries) {
        const delay = retryDelayMs * Math.pow(2, attempt - 1);
        log.warn('Download attempt failed, retrying', { url, attempt, delayMs: delay, error: lastError.message });
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new DownloadError('Download failed after retries', { stage: 'fetch' });
}

async function attemptDownload(
  url: string,
  onProgress: ((progress: DownloadProgress) => void) | undefined,
  signal: AbortSignal | undefined
): Promise<ReadableStream<Uint8Array>> {
  const response = await fetch(url, signal ? { signal } : {});

  if (!response.ok) {
    const kind = response.status >= 400 && response.status < 500 ? 'Client' : 'Server';
    throw new DownloadError(`${kind} error: ${response.status} ${response.statusText}`, {
      stage: 'fetch',
      status: response.status,
    });
  }

  const body = response.body;
  if (!body) {
    throw new DownloadError('Response body is null', { stage: 'fetch' });
  }

  const contentLength = response.headers.get('Content-Length');
  const totalBytes = contentLength ? parseInt(contentLength, 10) : undefined;

  if (!onProgress) {
    return body;
  }

  return withProgress(body, onProgress, totalBytes);
}

/**
 * Wrap a stream so that it reports progress at most every PROGRESS_INTERVAL_MS,
 * plus once at the end
 */
function withProgress(
  source: ReadableStream<Uint8Array>,
  onProgress: (progress: DownloadProgress) => void,
  totalBytes: number | undefined
): ReadableStream<Uint8Array> {
  let bytesDownloaded = 0;
  const startTime = Date.now();
  let lastProgressTime = startTime;

  const report = (now: number) => {
    const elapsedMs = now - startTime;
    onProgress({
      bytesDownloaded,
      ...(totalBytes !== undefined ? { totalBytes } : {}),
      bytesPerSecond: elapsedMs > 0 ? bytesDownloaded / (elapsedMs / 1000) : 0,
      elapsedMs,
    });
  };

  return source.pipeThrough(
    new TransformStream<Uint8Array, Uint8Array>({
      transform(chunk, controller) {
        bytesDownloaded += chunk.byteLength;
        controller.enqueue(chunk);

        const now = Date.now();
        if (now - lastProgressTime >= PROGRESS_INTERVAL_MS) {
          lastProgressTime = now;
          report(now);
        }
      },
      flush() {
        report(Date.now());
      },
    })
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Download a URL to a local file.
 *
 * Idempotent: an existing file is returned untouched. Bytes go to a `.part`
 * file that is renamed into place only after the body is complete; a failed
 * download removes it, and a stale one from a killed run is overwritten.
 */
export async function downloadToFile(
  url: string,
  outputPath: string,
  options: DownloadOptions = {}
): Promise<StageResult> {
  const log = loggers.fetch.withFields({ path: outputPath });
  const stagingPath = partialPath(outputPath);

  const existing = await fileSize(outputPath);
  if (existing !== null) {
    log.info('File already exists', { bytes: existing });
    return { path: outputPath, status: 'skipped', bytes: existing };
  }

  await mkdir(dirname(outputPath), { recursive: true });
  log.info('Downloading pageviews', { url });

  let totalBytes = 0;
  try {
    const handle = await open(stagingPath, 'w');
    try {
      const reader = (await streamDownload(url, options)).getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        try {
          await handle.write(value);
        } catch (error) {
          await reader.cancel(error);
          throw error;
        }
        totalBytes += value.byteLength;
      }
    } finally {
      await handle.close();
    }
    await promotePartial(outputPath);
  } catch (error) {
    log.error('Download failed', { url, error: errorMessage(error) });
    await rm(stagingPath, { force: true });
    throw error;
  }

  log.info('Download complete', { bytes: totalBytes });
  return { path: outputPath, status: 'created', bytes: totalBytes };
}

/**
 * Download the hourly dump of one time bucket into the raw directory
 */
export async function downloadPageviews(
  bucket: TimeBucket,
  config: Pick<PipelineConfig, 'dataDir' | 'rawDir' | 'processedDir' | 'pageviewsBaseUrl'>,
  options: DownloadOptions = {}
): Promise<StageResult> {
  const url = pageviewsUrl(bucket, config.pageviewsBaseUrl);
  try {
    return await downloadToFile(url, rawDumpPath(bucket, config), options);
  } catch (error) {
    if (error instanceof DownloadError) {
      throw new DownloadError(error.message, {
        stage: 'fetch',
        bucket: formatBucket(bucket),
        cause: error,
        ...(error.status !== undefined ? { status: error.status } : {}),
      });
    }
    throw error;
  }
}
