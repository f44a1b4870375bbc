/**
 * Per-bucket pipeline: fetch → extract → filter → load → summarize
 *
 * Stages run one after another in a single process. A failure stops the run;
 * retrying is left to whoever scheduled it, and the idempotent stages make a
 * rerun pick up where the failed one stopped.
 */

import { downloadPageviews } from '../ingest/download.js';
import { extractForBucket } from '../ingest/decompress.js';
import { filterForBucket } from '../ingest/filter.js';
import type { DownloadOptions, FilterOptions, FilterResult, StageResult } from '../ingest/types.js';
import type { PipelineConfig } from '../lib/config-schema.js';
import { StageError, errorMessage, isTypedError, type PipelineStage } from '../lib/errors.js';
import { generateRunId, loggers, withRunContext } from '../lib/logger.js';
import { formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import { summarize, type AggregateResult } from '../report/aggregate.js';
import { loadForBucket } from '../storage/load.js';
import { PostgresPageviewStore } from '../storage/postgres.js';
import type { PageviewStore } from '../storage/types.js';

export interface RunOptions {
  /** Store to load into; a PostgreSQL store from `config.database` when absent */
  store?: PageviewStore;
  /** Run id for log correlation; generated when absent */
  runId?: string;
  download?: DownloadOptions;
  filter?: FilterOptions;
}

export interface RunResult {
  runId: string;
  bucket: string;
  fetch: StageResult;
  extract: StageResult;
  filter: FilterResult;
  rowsAffected: number;
  summary: AggregateResult;
}

/**
 * Run one stage, wrapping untyped failures with the stage name and bucket
 */
export async function runStage<T>(
  stage: PipelineStage,
  bucket: TimeBucket,
  fn: () => Promise<T>
): Promise<T> {
  const log = loggers.run.child(stage);
  const startTime = Date.now();
  log.info('Stage started', { stage });

  try {
    const result = await fn();
    log.info('Stage finished', { stage, elapsedMs: Date.now() - startTime });
    return result;
  } catch (error) {
    log.error('Stage failed', { stage, error: errorMessage(error) });
    if (isTypedError(error)) {
      throw error;
    }
    throw new StageError(`${stage} failed for ${formatBucket(bucket)}: ${errorMessage(error)}`, {
      stage,
      bucket: formatBucket(bucket),
      cause: error,
    });
  }
}

/**
 * Process one hourly bucket end to end
 */
export async function runBucket(
  bucket: TimeBucket,
  config: PipelineConfig,
  options: RunOptions = {}
): Promise<RunResult> {
  const runId = options.runId ?? generateRunId();
  const label = formatBucket(bucket);

  return withRunContext({ runId, fields: { bucket: label } }, async () => {
    const log = loggers.run;
    const ownsStore = options.store === undefined;
    const store = options.store ?? new PostgresPageviewStore(config.database);

    log.info('Pipeline run started');
    try {
      const fetch = await runStage('fetch', bucket, () =>
        downloadPageviews(bucket, config, options.download)
      );
      const extract = await runStage('extract', bucket, () => extractForBucket(bucket, config));
      const filter = await runStage('filter', bucket, () =>
        filterForBucket(bucket, config, options.filter)
      );
      const rowsAffected = await runStage('load', bucket, () => loadForBucket(bucket, config, store));
      const summary = await runStage('summarize', bucket, () => summarize(store, bucket));

      const winner = summary.companies[0];
      log.info('Pipeline run finished', {
        rowsAffected,
        ...(winner ? { winner: winner.company, winnerViews: winner.totalViews } : {}),
      });

      return { runId, bucket: label, fetch, extract, filter, rowsAffected, summary };
    } finally {
      if (ownsStore) {
        await store.close();
      }
    }
  });
}
