/**
 * Type definitions for the pageviews ingestion stages
 */

/** One parsed dump line */
export interface PageviewRecord {
  /** Wikimedia project code, e.g. `en` or `en.m` */
  domain: string;
  pageTitle: string;
  viewCount: number;
  /** Total response size in bytes (always 0 in current dumps) */
  responseSize: number;
}

/** A dump record that belongs to a tracked company */
export interface FilteredRecord {
  company: string;
  pageTitle: string;
  viewCount: number;
  domain: string;
}

/**
 * Outcome of an idempotent stage: either the artifact was produced now, or
 * it already existed and no work was done.
 */
export type StageStatus = 'created' | 'skipped';

export interface StageResult {
  /** Artifact path */
  path: string;
  status: StageStatus;
  /** Artifact size in bytes */
  bytes: number;
}

/** Compression types supported by the extractor */
export type CompressionType = 'gzip' | 'none' | 'auto';

/** Progress information for downloads */
export interface DownloadProgress {
  /** Bytes downloaded so far */
  bytesDownloaded: number;
  /** Total bytes if known from Content-Length */
  totalBytes?: number;
  /** Download speed in bytes per second */
  bytesPerSecond: number;
  /** Elapsed time in milliseconds */
  elapsedMs: number;
}

/** Options for streaming download */
export interface DownloadOptions {
  onProgress?: (progress: DownloadProgress) => void;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Maximum retries on failure */
  maxRetries?: number;
  /** Initial retry delay in ms (doubles each retry) */
  retryDelayMs?: number;
}

/** Running counters of a filter scan */
export interface FilterStats {
  linesRead: number;
  malformedLines: number;
  matches: number;
  elapsedMs: number;
}

/** Options for the filter stage */
export interface FilterOptions {
  /** Report progress every N lines */
  progressInterval?: number;
  onProgress?: (stats: FilterStats) => void;
}

export interface FilterResult extends StageResult {
  /** Absent when the scan was skipped */
  stats?: FilterStats;
}
