/**
 * company-pageviews - Main Library Entry Point
 *
 * This module re-exports key functionality from the various sub-modules
 * for convenient access by library consumers.
 */

// ============================================================================
// INGESTION - download, extract, filter
// ============================================================================
export * from './ingest/index.js';

// ============================================================================
// STORAGE - PostgreSQL persistence
// ============================================================================
export * from './storage/index.js';

// ============================================================================
// REPORTING - company rankings
// ============================================================================
export * from './report/index.js';

// ============================================================================
// PIPELINE - per-bucket runner
// ============================================================================
export * from './pipeline/index.js';

// ============================================================================
// SHARED - configuration, errors, logging, time buckets
// ============================================================================
export {
  PipelineConfigSchema,
  DatabaseConfigSchema,
  CompanyMappingSchema,
  validatePipelineConfig,
  safeValidatePipelineConfig,
  formatValidationError,
} from './lib/config-schema.js';
export type {
  PipelineConfig,
  PipelineConfigInput,
  DatabaseConfig,
  CompanyMappingDocument,
} from './lib/config-schema.js';

export {
  ConfigError,
  InputNotFoundError,
  StoreUnavailableError,
  DownloadError,
  MalformedArtifactError,
  StageError,
  isTypedError,
  errorMessage,
  exitCodeForKind,
} from './lib/errors.js';
export type { ErrorKind, ErrorContext, PipelineStage, TypedError } from './lib/errors.js';

export {
  Logger,
  OperationLogger,
  createLogger,
  loggers,
  withRunContext,
  getRunContext,
  generateRunId,
  getLoggerProvider,
  setLoggerProvider,
  resetLoggerProvider,
} from './lib/logger.js';
export type { LogLevel, LogEntry, LoggerConfig, LoggerProvider, RunContext } from './lib/logger.js';

export {
  parseTimeBucket,
  bucketFromDate,
  bucketToDate,
  formatBucket,
  dumpStem,
  toSqlTimestamp,
  compareBuckets,
} from './lib/time-bucket.js';
export type { TimeBucket } from './lib/time-bucket.js';

export {
  rawDirOf,
  processedDirOf,
  rawDumpPath,
  extractedDumpPath,
  filteredPath,
  partialPath,
} from './lib/paths.js';
