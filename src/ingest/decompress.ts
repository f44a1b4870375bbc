/**
 * Streaming decompression of pageview dumps
 */

import { createReadStream } from 'node:fs';
import { mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { Readable } from 'node:stream';
import { DecompressionStream, TransformStream, type ReadableWritablePair } from 'node:stream/web';
import type { PipelineConfig } from '../lib/config-schema.js';
import { InputNotFoundError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import {
  fileSize,
  openInput,
  partialPath,
  processedDirOf,
  promotePartial,
  rawDumpPath,
} from '../lib/paths.js';
import { formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import type { CompressionType, StageResult } from './types.js';

/** Magic bytes for gzip detection */
const GZIP_MAGIC = [0x1f, 0x8b] as const;

type Decompressor = ReadableWritablePair<Uint8Array, Uint8Array>;

/**
 * Create a decompression transform.
 *
 * @param type - 'gzip' or 'none' (pass-through)
 *
 * @example
 * ```typescript
 * const decompressed = compressedStream.pipeThrough(createDecompressor('gzip'));
 * ```
 */
export function createDecompressor(type: Exclude<CompressionType, 'auto'>): Decompressor {
  if (type === 'gzip') {
    return new DecompressionStream('gzip');
  }
  return new TransformStream<Uint8Array, Uint8Array>();
}

/**
 * Detect compression type from file extension
 */
export function detectCompressionFromExtension(filename: string): CompressionType {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.gz') || lower.endsWith('.gzip')) {
    return 'gzip';
  }
  return 'auto';
}

async function sniffCompression(handle: FileHandle): Promise<'gzip' | 'none'> {
  const header = new Uint8Array(2);
  const { bytesRead } = await handle.read(header, 0, 2, 0);
  return bytesRead === 2 && header[0] === GZIP_MAGIC[0] && header[1] === GZIP_MAGIC[1]
    ? 'gzip'
    : 'none';
}

/**
 * Detect compression from the first bytes of a file
 */
export async function detectCompressionFromFile(path: string): Promise<'gzip' | 'none'> {
  const handle = await open(path, 'r');
  try {
    return await sniffCompression(handle);
  } finally {
    await handle.close();
  }
}

/**
 * Output file name for a compressed input: the name without `.gz`, or
 * `<name>.extracted` when there is no such extension
 */
export function extractedName(inputPath: string): string {
  const name = basename(inputPath);
  return name.endsWith('.gz') ? name.slice(0, -3) : `${name}.extracted`;
}

/**
 * Decompress a dump into `outputDir`.
 *
 * Idempotent by output existence. Output is staged in a `.part` file that is
 * renamed into place once complete, so an interrupted run never leaves a
 * truncated artifact under the final name.
 *
 * @throws {InputNotFoundError} If the input cannot be opened as a regular file
 */
export async function extractDump(
  inputPath: string,
  outputDir: string,
  compression: CompressionType = 'auto'
): Promise<StageResult> {
  const log = loggers.extract.withFields({ path: inputPath });
  const outputPath = join(outputDir, extractedName(inputPath));
  const stagingPath = partialPath(outputPath);

  await mkdir(outputDir, { recursive: true });

  const existing = await fileSize(outputPath);
  if (existing !== null) {
    log.info('File already extracted', { output: outputPath, bytes: existing });
    return { path: outputPath, status: 'skipped', bytes: existing };
  }

  const input = await openInput(inputPath, 'extract');

  log.info('Extracting', { output: outputPath });

  let totalBytes = 0;
  try {
    const type = compression === 'auto' ? await sniffCompression(input) : compression;
    const source = Readable.toWeb(input.createReadStream({ start: 0, autoClose: false }));
    const reader = source.pipeThrough(createDecompressor(type)).getReader();

    const handle = await open(stagingPath, 'w');
    try {
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
    log.error('Extraction failed', { error: errorMessage(error) });
    await rm(stagingPath, { force: true });
    throw error;
  } finally {
    await input.close();
  }

  log.info('Extraction complete', { output: outputPath, bytes: totalBytes });
  return { path: outputPath, status: 'created', bytes: totalBytes };
}

/**
 * Decompress the raw dump of one time bucket into the processed directory
 */
export async function extractForBucket(
  bucket: TimeBucket,
  config: Pick<PipelineConfig, 'dataDir' | 'rawDir' | 'processedDir'>
): Promise<StageResult> {
  try {
    return await extractDump(rawDumpPath(bucket, config), processedDirOf(config), 'gzip');
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      throw new InputNotFoundError(error.message, {
        stage: 'extract',
        bucket: formatBucket(bucket),
        cause: error,
      });
    }
    throw error;
  }
}
