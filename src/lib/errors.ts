/**
 * Typed error hierarchy for the pageviews pipeline
 *
 * Every error carries a `kind` discriminator plus optional pipeline context
 * (stage, time bucket, underlying cause) so that whoever invokes a stage can
 * decide between retrying and alerting.
 *
 * Usage:
 * ```ts
 * import { InputNotFoundError, isTypedError } from './lib/errors.js';
 *
 * throw new InputNotFoundError(`Input file not found: ${path}`, {
 *   stage: 'filter',
 *   bucket: '2025-12-17T16',
 * });
 *
 * if (isTypedError(error) && error.kind === 'STORE_UNAVAILABLE') { ... }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'CONFIG'
  | 'INPUT_NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'DOWNLOAD'
  | 'MALFORMED_ARTIFACT'
  | 'STAGE';

/** Pipeline stages, in execution order */
export type PipelineStage = 'fetch' | 'extract' | 'filter' | 'load' | 'summarize';

/** Context attached to a pipeline error */
export interface ErrorContext {
  /** Stage that failed */
  stage?: PipelineStage;
  /** Time bucket being processed, in `YYYY-MM-DDTHH` form */
  bucket?: string;
  /** Underlying error */
  cause?: unknown;
}

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
  readonly stage: PipelineStage | undefined;
  readonly bucket: string | undefined;
}

/**
 * Shared implementation for all pipeline errors.
 * Not exported: callers narrow on the concrete classes or on `kind`.
 */
abstract class PipelineError extends Error implements TypedError {
  abstract readonly kind: ErrorKind;
  readonly stage: PipelineStage | undefined;
  readonly bucket: string | undefined;

  protected constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.stage = context.stage;
    this.bucket = context.bucket;
  }
}

/**
 * Company mapping or pipeline configuration is unreadable or malformed.
 * Fatal: the run is aborted.
 */
export class ConfigError extends PipelineError {
  readonly kind = 'CONFIG' as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * An expected upstream artifact (raw dump, decompressed dump, filtered file)
 * is missing.
 */
export class InputNotFoundError extends PipelineError {
  readonly kind = 'INPUT_NOT_FOUND' as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'InputNotFoundError';
    Object.setPrototypeOf(this, InputNotFoundError.prototype);
  }
}

/**
 * Database connection or transaction failure. The failing call has already
 * been rolled back when this is thrown.
 */
export class StoreUnavailableError extends PipelineError {
  readonly kind = 'STORE_UNAVAILABLE' as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * HTTP failure while fetching a dump
 */
export class DownloadError extends PipelineError {
  readonly kind = 'DOWNLOAD' as const;
  /** HTTP status, when the server answered */
  readonly status: number | undefined;

  constructor(message: string, context: ErrorContext & { status?: number } = {}) {
    super(message, context);
    this.name = 'DownloadError';
    this.status = context.status;
    Object.setPrototypeOf(this, DownloadError.prototype);
  }

  /** 4xx responses will not get better by asking again */
  get retryable(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

/**
 * A filtered artifact exists but cannot be parsed back into records
 */
export class MalformedArtifactError extends PipelineError {
  readonly kind = 'MALFORMED_ARTIFACT' as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'MalformedArtifactError';
    Object.setPrototypeOf(this, MalformedArtifactError.prototype);
  }
}

/**
 * Untyped failure surfaced by a stage, wrapped with its stage and bucket
 */
export class StageError extends PipelineError {
  readonly kind = 'STAGE' as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'StageError';
    Object.setPrototypeOf(this, StageError.prototype);
  }
}

/**
 * Type guard to check if an error is a typed pipeline error
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map error kind to a process exit code for the CLI
 */
export function exitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'CONFIG':
      return 78;
    case 'INPUT_NOT_FOUND':
      return 66;
    case 'STORE_UNAVAILABLE':
      return 69;
    case 'DOWNLOAD':
      return 75;
    case 'MALFORMED_ARTIFACT':
      return 65;
    case 'STAGE':
      return 1;
    default:
      return 1;
  }
}
