/**
 * Artifact locations and existence checks
 */

import { open, rename, stat, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineConfig } from './config-schema.js';
import { InputNotFoundError, errorMessage, type PipelineStage } from './errors.js';
import { dumpStem, type TimeBucket } from './time-bucket.js';

type DirConfig = Pick<PipelineConfig, 'dataDir' | 'rawDir' | 'processedDir'>;

export function rawDirOf(config: DirConfig): string {
  return config.rawDir ?? join(config.dataDir, 'raw');
}

export function processedDirOf(config: DirConfig): string {
  return config.processedDir ?? join(config.dataDir, 'processed');
}

/** `<rawDir>/pageviews-YYYYMMDD-HH0000.gz` */
export function rawDumpPath(bucket: TimeBucket, config: DirConfig): string {
  return join(rawDirOf(config), `${dumpStem(bucket)}.gz`);
}

/** `<processedDir>/pageviews-YYYYMMDD-HH0000` */
export function extractedDumpPath(bucket: TimeBucket, config: DirConfig): string {
  return join(processedDirOf(config), dumpStem(bucket));
}

/** `<processedDir>/filtered_pageviews-YYYYMMDD-HH0000.csv` */
export function filteredPath(bucket: TimeBucket, config: DirConfig): string {
  return join(processedDirOf(config), `filtered_${dumpStem(bucket)}.csv`);
}

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Size of a file, or null when nothing exists at the path.
 * Other failures (permissions, I/O) propagate.
 */
export async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.size;
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await fileSize(path)) !== null;
}

/**
 * Staging name an artifact is written under until it is complete.
 * Existence checks only ever look at the final name.
 */
export function partialPath(path: string): string {
  return `${path}.part`;
}

/**
 * Move a fully written staging file to its final name
 */
export async function promotePartial(path: string): Promise<void> {
  await rename(partialPath(path), path);
}

/**
 * Open a stage input for reading.
 *
 * @throws {InputNotFoundError} If the path is missing, is not a regular file
 * or cannot be opened
 */
export async function openInput(path: string, stage: PipelineStage): Promise<FileHandle> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    const message = isMissing(error)
      ? `Input file not found: ${path}`
      : `Cannot open input file ${path}: ${errorMessage(error)}`;
    throw new InputNotFoundError(message, { stage, cause: error });
  }

  try {
    const info = await handle.stat();
    if (!info.isFile()) {
      throw new InputNotFoundError(`Input is not a regular file: ${path}`, { stage });
    }
  } catch (error) {
    await handle.close();
    throw error;
  }
  return handle;
}
