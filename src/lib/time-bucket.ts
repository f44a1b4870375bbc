/**
 * Hour-granularity time buckets
 *
 * A bucket keys one pipeline run, one set of dump files and one partition of
 * the persisted table. All buckets are UTC.
 */

import { ConfigError } from './errors.js';

export interface TimeBucket {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  /** 0-23 */
  hour: number;
}

const BUCKET_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{1,2})(?::00(?::00)?)?Z?$/;

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Parse `YYYY-MM-DDTHH` (also accepts a space separator, `:00`, `:00:00`
 * and a trailing `Z`).
 *
 * @throws {ConfigError} On any other shape or an impossible date
 */
export function parseTimeBucket(text: string): TimeBucket {
  const match = BUCKET_PATTERN.exec(text.trim());
  if (!match) {
    throw new ConfigError(`Invalid time bucket "${text}": expected YYYY-MM-DDTHH`);
  }

  const [, year, month, day, hour] = match;
  const bucket: TimeBucket = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
  };

  // Round-trip through Date to reject 2025-02-30 and hour 24
  const date = bucketToDate(bucket);
  if (
    bucket.hour > 23 ||
    date.getUTCFullYear() !== bucket.year ||
    date.getUTCMonth() + 1 !== bucket.month ||
    date.getUTCDate() !== bucket.day
  ) {
    throw new ConfigError(`Invalid time bucket "${text}": no such hour`);
  }

  return bucket;
}

/**
 * Truncate a date to its UTC hour
 */
export function bucketFromDate(date: Date): TimeBucket {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
  };
}

export function bucketToDate(bucket: TimeBucket): Date {
  return new Date(Date.UTC(bucket.year, bucket.month - 1, bucket.day, bucket.hour));
}

/** `2025-12-17T16` */
export function formatBucket(bucket: TimeBucket): string {
  return `${bucket.year}-${pad2(bucket.month)}-${pad2(bucket.day)}T${pad2(bucket.hour)}`;
}

/** `pageviews-20251217-160000`, the dump name without extension */
export function dumpStem(bucket: TimeBucket): string {
  return `pageviews-${bucket.year}${pad2(bucket.month)}${pad2(bucket.day)}-${pad2(bucket.hour)}0000`;
}

/** `2025-12-17 16:00:00`, the value bound to `execution_date` */
export function toSqlTimestamp(bucket: TimeBucket): string {
  return `${bucket.year}-${pad2(bucket.month)}-${pad2(bucket.day)} ${pad2(bucket.hour)}:00:00`;
}

export function compareBuckets(a: TimeBucket, b: TimeBucket): number {
  return bucketToDate(a).getTime() - bucketToDate(b).getTime();
}
