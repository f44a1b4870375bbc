/**
 * Structured Logger Utility
 *
 * Structured logging for the pageviews pipeline.
 *
 * Features:
 * - Log levels: debug, info, warn, error
 * - Human-readable text or JSON lines (LOG_FORMAT=json, default in production)
 * - Environment-based level control (LOG_LEVEL env var)
 * - Child loggers per pipeline stage
 * - Run context (run id, time bucket) propagated through AsyncLocalStorage
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Run context stored in AsyncLocalStorage */
export interface RunContext {
  /** Unique id of one pipeline run */
  runId: string;
  /** Additional fields to include in all logs (e.g. the bucket) */
  fields?: Record<string, unknown>;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

/**
 * Generate a unique run ID
 */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * Run an async function with run context.
 * All logs within the callback include the run id and fields.
 */
export async function withRunContext<T>(
  context: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return runContextStorage.run(context, fn);
}

/**
 * Get the current run context, if any
 */
export function getRunContext(): RunContext | undefined {
  return runContextStorage.getStore();
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/** Log entry structure */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Logger context (module name) */
  context: string;
  message: string;
  /** Optional structured data */
  data?: Record<string, unknown>;
  /** Error stack trace */
  stack?: string;
  operation?: string;
  /** Run id (from AsyncLocalStorage) */
  runId?: string;
  service?: string;
  environment?: string;
  host?: string;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format: 'text' for human-readable, 'json' for structured */
  format: 'text' | 'json';
  /** Logger context (module name) */
  context: string;
  /** Whether to include timestamps in text output */
  timestamps: boolean;
  /** Service name for log aggregation */
  service: string;
  /** Default fields to include in all log entries */
  defaultFields?: Record<string, unknown>;
}

const DEFAULT_SERVICE = 'pageviews';

function getServiceFromEnv(): string {
  return process.env['SERVICE_NAME'] ?? DEFAULT_SERVICE;
}

function getEnvironmentFromEnv(): string {
  return process.env['NODE_ENV'] ?? 'development';
}

function getHostFromEnv(): string | undefined {
  return process.env['HOSTNAME'] ?? undefined;
}

function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

function getLogFormatFromEnv(): 'text' | 'json' {
  const envFormat = process.env['LOG_FORMAT']?.toLowerCase();
  if (envFormat === 'json' || envFormat === 'text') {
    return envFormat;
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

/**
 * Format a log entry as human-readable text
 */
function formatText(entry: LogEntry, config: LoggerConfig): string {
  const parts: string[] = [];

  if (config.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString('en-US', {
      hour12: false,
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    parts.push(`${COLORS.dim}${time}${COLORS.reset}`);
  }

  parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${COLORS.reset}`);

  if (entry.runId) {
    const shortId = entry.runId.split('-')[0] ?? entry.runId.substring(0, 8);
    parts.push(`${COLORS.dim}[${shortId}]${COLORS.reset}`);
  }

  parts.push(`${COLORS.cyan}[${entry.context}]${COLORS.reset}`);

  if (entry.operation) {
    parts.push(`${COLORS.dim}(${entry.operation})${COLORS.reset}`);
  }

  parts.push(entry.message);

  if (entry.data && Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(' ');
    parts.push(`${COLORS.dim}${dataStr}${COLORS.reset}`);
  }

  let output = parts.join(' ');

  if (entry.stack) {
    output += `\n${COLORS.dim}${entry.stack}${COLORS.reset}`;
  }

  return output;
}

/**
 * Logger class for structured logging
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly minLevel: number;
  private readonly environment: string;
  private readonly host: string | undefined;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? getLogLevelFromEnv(),
      format: config.format ?? getLogFormatFromEnv(),
      context: config.context ?? 'app',
      timestamps: config.timestamps ?? true,
      service: config.service ?? getServiceFromEnv(),
      ...(config.defaultFields !== undefined ? { defaultFields: config.defaultFields } : {}),
    };
    this.minLevel = LOG_LEVEL_VALUES[this.config.level];
    this.environment = getEnvironmentFromEnv();
    this.host = getHostFromEnv();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= this.minLevel;
  }

  private write(entry: LogEntry): void {
    const output =
      this.config.format === 'json'
        ? JSON.stringify(entry)
        : formatText(entry, this.config);

    // stderr for warn and error, stdout for others
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const runContext = getRunContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.config.context,
      message,
      service: this.config.service,
      environment: this.environment,
    };

    if (runContext?.runId) {
      entry.runId = runContext.runId;
    }

    if (this.host) {
      entry.host = this.host;
    }

    if (this.config.defaultFields) {
      entry.data = { ...this.config.defaultFields };
    }

    if (runContext?.fields) {
      entry.data = { ...entry.data, ...runContext.fields };
    }

    if (data) {
      const error = data['error'];
      if (error instanceof Error) {
        if (error.stack) {
          entry.stack = error.stack;
        }
        data = { ...data, error: error.message };
      }
      entry.data = { ...entry.data, ...data };
    }

    if (operation) {
      entry.operation = operation;
    }

    this.write(entry);
  }

  debug(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('debug', message, data, operation);
  }

  info(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('info', message, data, operation);
  }

  warn(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('warn', message, data, operation);
  }

  error(message: string, data?: Record<string, unknown>, operation?: string): void {
    this.log('error', message, data, operation);
  }

  /**
   * Log an error with its stack trace and name
   */
  errorWithStack(
    message: string,
    error: Error,
    data?: Record<string, unknown>,
    operation?: string
  ): void {
    this.log('error', message, { ...data, error, errorName: error.name }, operation);
  }

  /**
   * Create a child logger with a nested context (`parent:child`)
   */
  child(context: string): Logger {
    return new Logger({
      ...this.config,
      context: `${this.config.context}:${context}`,
    });
  }

  /**
   * Create a logger that tags every entry with an operation name
   */
  withOperation(operation: string): OperationLogger {
    return new OperationLogger(this, operation);
  }

  /**
   * Create a logger with additional default fields
   */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: { ...this.config.defaultFields, ...fields },
    });
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Operation-scoped logger that automatically includes the operation name
 */
export class OperationLogger {
  constructor(
    private readonly logger: Logger,
    private readonly operation: string
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(message, data, this.operation);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(message, data, this.operation);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(message, data, this.operation);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(message, data, this.operation);
  }
}

/**
 * Logger provider interface, replaceable in tests
 */
export interface LoggerProvider {
  /** Create a logger for a specific context */
  createLogger(context: string): Logger;
}

class DefaultLoggerProvider implements LoggerProvider {
  private readonly loggerCache = new Map<string, Logger>();

  createLogger(context: string): Logger {
    let logger = this.loggerCache.get(context);
    if (!logger) {
      logger = new Logger({ context });
      this.loggerCache.set(context, logger);
    }
    return logger;
  }
}

let loggerProvider: LoggerProvider = new DefaultLoggerProvider();

export function getLoggerProvider(): LoggerProvider {
  return loggerProvider;
}

/**
 * Set a custom logger provider
 * @returns The previous provider, for restoration
 */
export function setLoggerProvider(provider: LoggerProvider): LoggerProvider {
  const previous = loggerProvider;
  loggerProvider = provider;
  return previous;
}

export function resetLoggerProvider(): void {
  loggerProvider = new DefaultLoggerProvider();
}

/**
 * Create a logger for a specific module through the current provider
 */
export function createLogger(context: string): Logger {
  return loggerProvider.createLogger(context);
}

/**
 * Per-stage loggers (resolved through the provider on every access)
 */
export const loggers = {
  get fetch() { return createLogger('fetch'); },
  get extract() { return createLogger('extract'); },
  get filter() { return createLogger('filter'); },
  get store() { return createLogger('store'); },
  get report() { return createLogger('report'); },
  get run() { return createLogger('run'); },
  get cli() { return createLogger('cli'); },
} as const;
