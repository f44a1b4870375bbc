/**
 * Type definitions for pageview persistence
 */

import type { FilteredRecord } from '../ingest/types.js';
import type { TimeBucket } from '../lib/time-bucket.js';

/** A row of `wikipedia_pageviews` */
export interface StoredRow {
  id: number;
  company: string;
  page_title: string;
  view_count: number;
  domain: string;
  /** `YYYY-MM-DD HH:00:00` */
  execution_date: string;
  created_at: Date;
}

/** Inclusive range of time buckets */
export interface BucketRange {
  from: TimeBucket;
  to: TimeBucket;
}

/** Views summed per (company, page title) over a bucket range */
export interface PageTotal {
  company: string;
  pageTitle: string;
  views: number;
}

/**
 * Persistence of filtered records, one row per (company, time bucket).
 *
 * Implementations must make `upsert` atomic and last-write-wins per key, so
 * that loading the same bucket any number of times converges to the state of
 * a single clean load.
 */
export interface PageviewStore {
  /** Create the table and its indexes when absent. Safe on every call. */
  ensureSchema(): Promise<void>;

  /**
   * Insert or overwrite the rows of one bucket in a single transaction.
   *
   * @returns Rows inserted or updated; 0 for an empty input (nothing written)
   */
  upsert(records: readonly FilteredRecord[], executionDate: TimeBucket): Promise<number>;

  /** Stored rows in the range, ordered by execution date then company */
  listRows(range: BucketRange): Promise<StoredRow[]>;

  /** Views summed per company and page over the range */
  sumViewsByPage(range: BucketRange): Promise<PageTotal[]>;

  /** Release connections */
  close(): Promise<void>;
}
