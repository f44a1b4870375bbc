/**
 * Storage Layer - PostgreSQL persistence of filtered pageviews
 *
 * One row per (company, hour), written with an idempotent upsert.
 */

// Type definitions
export type { BucketRange, PageTotal, PageviewStore, StoredRow } from './types.js';

// Schema
export {
  CREATE_TABLE_SQL,
  CREATE_INDEXES_SQL,
  COMMENTS_SQL,
  SUM_BY_PAGE_SQL,
  LIST_ROWS_SQL,
  buildUpsertSql,
} from './schema.js';

// PostgreSQL store
export { PostgresPageviewStore, lastRecordPerCompany, toPoolConfig } from './postgres.js';

// Loader
export { loadFilteredFile, loadForBucket } from './load.js';
