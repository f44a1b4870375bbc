/**
 * Test helpers and utilities
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FilteredRecord } from '../src/ingest/types.js';
import { StoreUnavailableError } from '../src/lib/errors.js';
import { formatBucket, toSqlTimestamp, type TimeBucket } from '../src/lib/time-bucket.js';
import { lastRecordPerCompany } from '../src/storage/postgres.js';
import type { BucketRange, PageTotal, PageviewStore, StoredRow } from '../src/storage/types.js';

/** 2025-12-17T16 */
export const TEST_BUCKET: TimeBucket = { year: 2025, month: 12, day: 17, hour: 16 };

/**
 * Create a mock FilteredRecord for testing
 */
export function createMockRecord(overrides: Partial<FilteredRecord> = {}): FilteredRecord {
  return {
    company: 'Acme',
    pageTitle: 'Acme_Corp',
    viewCount: 42,
    domain: 'en',
    ...overrides,
  };
}

/**
 * Create a temporary directory, removed by the returned cleanup function
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'pageviews-test-'));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * In-memory PageviewStore with the same upsert semantics as the PostgreSQL
 * store: one row per (company, execution date), last write wins, all or
 * nothing per call.
 */
export class MemoryPageviewStore implements PageviewStore {
  readonly rows = new Map<string, StoredRow>();
  schemaCalls = 0;
  upsertCalls = 0;
  closed = false;
  /** Makes the next upsert fail after staging its rows */
  failNextUpsert = false;
  private nextId = 1;

  async ensureSchema(): Promise<void> {
    this.schemaCalls++;
  }

  async upsert(records: readonly FilteredRecord[], executionDate: TimeBucket): Promise<number> {
    this.upsertCalls++;
    if (records.length === 0) {
      return 0;
    }

    const timestamp = toSqlTimestamp(executionDate);
    const staged = new Map(this.rows);
    const rows = lastRecordPerCompany(records);
    for (const record of rows) {
      const key = `${record.company}|${timestamp}`;
      const existing = staged.get(key);
      staged.set(key, {
        id: existing?.id ?? this.nextId++,
        company: record.company,
        page_title: record.pageTitle,
        view_count: record.viewCount,
        domain: record.domain,
        execution_date: timestamp,
        created_at: existing?.created_at ?? new Date(0),
      });
    }

    if (this.failNextUpsert) {
      this.failNextUpsert = false;
      throw new StoreUnavailableError('Data load failed: simulated failure', {
        stage: 'load',
        bucket: formatBucket(executionDate),
      });
    }

    this.rows.clear();
    for (const [key, row] of staged) {
      this.rows.set(key, row);
    }
    return rows.length;
  }

  async listRows(range: BucketRange): Promise<StoredRow[]> {
    const from = toSqlTimestamp(range.from);
    const to = toSqlTimestamp(range.to);
    return [...this.rows.values()]
      .filter((row) => row.execution_date >= from && row.execution_date <= to)
      .sort((a, b) =>
        a.execution_date === b.execution_date
          ? a.company.localeCompare(b.company)
          : a.execution_date.localeCompare(b.execution_date)
      );
  }

  async sumViewsByPage(range: BucketRange): Promise<PageTotal[]> {
    const totals = new Map<string, PageTotal>();
    for (const row of await this.listRows(range)) {
      const key = `${row.company}|${row.page_title}`;
      const total = totals.get(key) ?? { company: row.company, pageTitle: row.page_title, views: 0 };
      total.views += row.view_count;
      totals.set(key, total);
    }
    return [...totals.values()];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
