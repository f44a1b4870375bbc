/**
 * Load a filtered artifact into the pageview store
 */

import type { PipelineConfig } from '../lib/config-schema.js';
import { InputNotFoundError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { filteredPath } from '../lib/paths.js';
import { formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import { readFilteredFile } from '../ingest/filtered-file.js';
import type { FilteredRecord } from '../ingest/types.js';
import type { PageviewStore } from './types.js';

/**
 * Read `csvPath` and upsert its records under `bucket`.
 *
 * Re-loading the same artifact converges to the same table state. A
 * header-only artifact loads nothing and never touches the store.
 *
 * @returns Rows inserted or updated
 * @throws {InputNotFoundError} If the artifact is missing
 * @throws {MalformedArtifactError} If it cannot be parsed
 * @throws {StoreUnavailableError} If the store rejects the write
 */
export async function loadFilteredFile(
  csvPath: string,
  bucket: TimeBucket,
  store: PageviewStore
): Promise<number> {
  const log = loggers.store;

  let records: FilteredRecord[];
  try {
    records = await readFilteredFile(csvPath);
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      throw new InputNotFoundError(error.message, {
        stage: 'load',
        bucket: formatBucket(bucket),
        cause: error,
      });
    }
    throw error;
  }

  if (records.length === 0) {
    log.warn('No filtered records to load', { path: csvPath, bucket: formatBucket(bucket) });
    return 0;
  }

  log.info('Loading filtered records', { path: csvPath, records: records.length });

  await store.ensureSchema();
  return store.upsert(records, bucket);
}

/**
 * Load the filtered artifact of one time bucket
 */
export async function loadForBucket(
  bucket: TimeBucket,
  config: Pick<PipelineConfig, 'dataDir' | 'rawDir' | 'processedDir'>,
  store: PageviewStore
): Promise<number> {
  return loadFilteredFile(filteredPath(bucket, config), bucket, store);
}
