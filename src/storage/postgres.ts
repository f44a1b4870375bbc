/**
 * PostgreSQL implementation of the pageview store
 *
 * Every write runs in its own transaction on a pooled client; a failure rolls
 * that transaction back before a StoreUnavailableError propagates, so buckets
 * committed earlier are never touched.
 */

import pg from 'pg';
import type { Pool, PoolClient, PoolConfig } from 'pg';
import { parse as parseConnectionString } from 'pg-connection-string';
import type { FilteredRecord } from '../ingest/types.js';
import type { DatabaseConfig } from '../lib/config-schema.js';
import { UPSERT_CHUNK_ROWS } from '../lib/constants.js';
import { StoreUnavailableError, errorMessage, type ErrorContext } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { formatBucket, toSqlTimestamp, type TimeBucket } from '../lib/time-bucket.js';
import {
  COMMENTS_SQL,
  CREATE_INDEXES_SQL,
  CREATE_TABLE_SQL,
  LIST_ROWS_SQL,
  SUM_BY_PAGE_SQL,
  buildUpsertSql,
} from './schema.js';
import type { BucketRange, PageTotal, PageviewStore, StoredRow } from './types.js';

/**
 * Translate validated database settings into pool options.
 *
 * The connection string is parsed into discrete fields and any field set on
 * its own overrides the one from the URL. pg itself would let a
 * `connectionString` win over every discrete field, so none is passed on.
 */
export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  const url = config.url !== undefined ? parseConnectionString(config.url) : undefined;
  const host = config.host ?? url?.host ?? undefined;
  const port = config.port ?? (url?.port ? Number(url.port) : undefined);
  const database = config.database ?? url?.database ?? undefined;
  const user = config.user ?? url?.user;
  const password = config.password ?? (url?.password || undefined);

  return {
    ...(host ? { host } : {}),
    ...(port !== undefined && Number.isInteger(port) ? { port } : {}),
    ...(database ? { database } : {}),
    ...(user ? { user } : {}),
    ...(password !== undefined ? { password } : {}),
    ...(config.ssl || url?.ssl ? { ssl: { rejectUnauthorized: false } } : {}),
    max: config.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  };
}

/**
 * Collapse records sharing a company to the last one. One INSERT ... ON
 * CONFLICT statement may not touch the same key twice.
 */
export function lastRecordPerCompany(records: readonly FilteredRecord[]): FilteredRecord[] {
  const byCompany = new Map<string, FilteredRecord>();
  for (const record of records) {
    byCompany.set(record.company, record);
  }
  return [...byCompany.values()];
}

interface SumRow {
  company: string;
  page_title: string;
  /** SUM over INTEGER is BIGINT, which pg hands back as text */
  views: string;
}

export class PostgresPageviewStore implements PageviewStore {
  private readonly pool: Pool;
  private readonly log = loggers.store;

  constructor(config: DatabaseConfig) {
    this.pool = new pg.Pool(toPoolConfig(config));
    this.pool.on('error', (error) => {
      this.log.error('Idle database client error', { error: error.message });
    });
  }

  async ensureSchema(): Promise<void> {
    await this.transaction('Table creation', { stage: 'load' }, async (client) => {
      await client.query(CREATE_TABLE_SQL);
      for (const sql of CREATE_INDEXES_SQL) {
        await client.query(sql);
      }
      for (const sql of COMMENTS_SQL) {
        await client.query(sql);
      }
    });
    this.log.info('Table wikipedia_pageviews is ready');
  }

  async upsert(records: readonly FilteredRecord[], executionDate: TimeBucket): Promise<number> {
    const bucket = formatBucket(executionDate);

    if (records.length === 0) {
      this.log.warn('No records to load', { bucket });
      return 0;
    }

    const rows = lastRecordPerCompany(records);
    if (rows.length < records.length) {
      this.log.warn('Several records for one company in a bucket; keeping the last of each', {
        bucket,
        records: records.length,
        companies: rows.length,
      });
    }

    const timestamp = toSqlTimestamp(executionDate);
    const affected = await this.transaction('Data load', { stage: 'load', bucket }, async (client) => {
      let total = 0;
      for (let start = 0; start < rows.length; start += UPSERT_CHUNK_ROWS) {
        const chunk = rows.slice(start, start + UPSERT_CHUNK_ROWS);
        const params = chunk.flatMap((r) => [r.company, r.pageTitle, r.viewCount, r.domain, timestamp]);
        const result = await client.query(buildUpsertSql(chunk.length), params);
        total += result.rowCount ?? 0;
      }
      return total;
    });

    this.log.info('Inserted/updated rows', { bucket, rows: affected });
    return affected;
  }

  async listRows(range: BucketRange): Promise<StoredRow[]> {
    return this.read('List rows', range, async (client) => {
      const result = await client.query<StoredRow>(LIST_ROWS_SQL, [
        toSqlTimestamp(range.from),
        toSqlTimestamp(range.to),
      ]);
      return result.rows;
    });
  }

  async sumViewsByPage(range: BucketRange): Promise<PageTotal[]> {
    return this.read('Aggregation', range, async (client) => {
      const result = await client.query<SumRow>(SUM_BY_PAGE_SQL, [
        toSqlTimestamp(range.from),
        toSqlTimestamp(range.to),
      ]);
      return result.rows.map((row) => ({
        company: row.company,
        pageTitle: row.page_title,
        views: Number(row.views),
      }));
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.log.info('Database connection closed');
  }

  private async connect(context: ErrorContext): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      this.log.error('Database connection failed', { error: errorMessage(error) });
      throw new StoreUnavailableError(`Database connection failed: ${errorMessage(error)}`, {
        ...context,
        cause: error,
      });
    }
  }

  private async read<T>(
    operation: string,
    range: BucketRange,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    const log = this.log.withOperation(operation);
    const context: ErrorContext = { stage: 'summarize', bucket: formatBucket(range.from) };
    const client = await this.connect(context);
    try {
      return await fn(client);
    } catch (error) {
      log.error(`${operation} failed`, { error: errorMessage(error) });
      throw new StoreUnavailableError(`${operation} failed: ${errorMessage(error)}`, {
        ...context,
        cause: error,
      });
    } finally {
      client.release();
    }
  }

  /**
   * Run `fn` between BEGIN and COMMIT; ROLLBACK on any failure.
   */
  private async transaction<T>(
    operation: string,
    context: ErrorContext,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    const log = this.log.withOperation(operation);
    const client = await this.connect(context);
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // The connection is unusable; destroy it instead of returning it to the pool
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        log.error('Rollback failed', { error: broken.message });
      }
      log.error(`${operation} failed`, { error: errorMessage(error) });
      throw new StoreUnavailableError(`${operation} failed: ${errorMessage(error)}`, {
        ...context,
        cause: error,
      });
    } finally {
      client.release(broken);
    }
  }
}
