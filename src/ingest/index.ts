/**
 * Pageviews ingestion
 *
 * Streaming components to download and decompress hourly pageview dumps and
 * filter them down to tracked company pages.
 *
 * @example
 * ```typescript
 * import { downloadPageviews, extractForBucket, filterForBucket } from 'company-pageviews/ingest';
 *
 * await downloadPageviews(bucket, config);
 * await extractForBucket(bucket, config);
 * const { path } = await filterForBucket(bucket, config);
 * ```
 */

// Type exports
export type {
  PageviewRecord,
  FilteredRecord,
  StageStatus,
  StageResult,
  CompressionType,
  DownloadProgress,
  DownloadOptions,
  FilterStats,
  FilterOptions,
  FilterResult,
} from './types.js';

// Download utilities
export { pageviewsUrl, streamDownload, downloadToFile, downloadPageviews } from './download.js';

// Decompression utilities
export {
  createDecompressor,
  detectCompressionFromExtension,
  detectCompressionFromFile,
  extractedName,
  extractDump,
  extractForBucket,
} from './decompress.js';

// Company mapping
export { CompanyDirectory, loadCompanyDirectory } from './companies.js';

// Dump line parsing
export { parsePageviewLine, readLines } from './parse-pageviews.js';

// Filtered artifact codec
export {
  escapeField,
  formatRow,
  parseRows,
  formatFilteredRecords,
  parseFilteredRecords,
  writeFilteredFile,
  readFilteredFile,
} from './filtered-file.js';

// Filter
export { filterPageviews, filterForBucket } from './filter.js';
