/**
 * CLI Utilities
 *
 * Shared utilities for the pageviews CLI commands: configuration loading,
 * colored output, spinners, tables.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { Command } from 'commander';
import { createLogger } from '../lib/logger.js';
import {
  type PipelineConfig,
  safeValidatePipelineConfig,
  formatValidationError,
} from '../lib/config-schema.js';
import { ConfigError, errorMessage, exitCodeForKind, isTypedError } from '../lib/errors.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/** Color output helpers */
export const color = {
  reset: (s: string) => `${colors.reset}${s}${colors.reset}`,
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  red: (s: string) => `${colors.red}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  yellow: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  blue: (s: string) => `${colors.blue}${s}${colors.reset}`,
  magenta: (s: string) => `${colors.magenta}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  white: (s: string) => `${colors.white}${s}${colors.reset}`,
  gray: (s: string) => `${colors.gray}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${colors.bold}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${colors.bold}${s}${colors.reset}`,
  info: (s: string) => `${colors.cyan}${s}${colors.reset}`,
};

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Progress bar configuration */
export interface ProgressBarConfig {
  /** Total items to process */
  total: number;
  /** Bar width in characters */
  width?: number;
  /** Format string: :bar :current/:total :percent :eta */
  format?: string;
  /** Stream to write to */
  stream?: NodeJS.WriteStream;
  /** Clear on complete */
  clearOnComplete?: boolean;
  /** Show ETA */
  showEta?: boolean;
}

/**
 * Create a progress bar
 */
export function createProgressBar(config: ProgressBarConfig): {
  update: (current: number, tokens?: Record<string, string | number>) => void;
  complete: () => void;
  interrupt: (message: string) => void;
} {
  const {
    total,
    width = 40,
    format = '  :bar :percent | :current/:total | :rate/s | ETA :eta',
    stream = process.stderr,
    clearOnComplete = true,
    showEta = true,
  } = config;

  let startTime = 0;
  let lastCurrent = 0;
  let lastTime = 0;
  let smoothRate = 0;

  function render(current: number, tokens: Record<string, string | number> = {}): void {
    if (startTime === 0) {
      startTime = Date.now();
      lastTime = startTime;
    }

    const now = Date.now();
    const elapsed = (now - startTime) / 1000;

    // Calculate smoothed rate
    if (now - lastTime > 100) {
      const instantRate = (current - lastCurrent) / ((now - lastTime) / 1000);
      smoothRate = smoothRate === 0 ? instantRate : smoothRate * 0.8 + instantRate * 0.2;
      lastCurrent = current;
      lastTime = now;
    }

    const rate = smoothRate || (elapsed > 0 ? current / elapsed : 0);
    const percent = total > 0 ? current / total : 0;
    const remaining = total > 0 ? total - current : 0;
    const eta = rate > 0 ? remaining / rate : 0;

    // Build progress bar
    const filled = Math.round(width * percent);
    const empty = width - filled;
    const bar = color.green('█'.repeat(filled)) + color.gray('░'.repeat(empty));

    // Replace tokens in format
    let output = format
      .replace(':bar', bar)
      .replace(':current', formatNumber(current))
      .replace(':total', formatNumber(total))
      .replace(':percent', `${(percent * 100).toFixed(1)}%`.padStart(6))
      .replace(':rate', formatNumber(Math.round(rate)))
      .replace(':eta', showEta ? formatDuration(eta) : '')
      .replace(':elapsed', formatDuration(elapsed));

    // Apply custom tokens
    for (const [key, value] of Object.entries(tokens)) {
      output = output.replace(`:${key}`, String(value));
    }

    // Clear line and write
    stream.write(`\r${output}\x1b[K`);
  }

  function complete(): void {
    render(total);
    if (clearOnComplete) {
      stream.write('\r\x1b[K');
    } else {
      stream.write('\n');
    }
  }

  function interrupt(message: string): void {
    stream.write(`\r\x1b[K${message}\n`);
    if (lastCurrent > 0) {
      render(lastCurrent);
    }
  }

  return {
    update: render,
    complete,
    interrupt,
  };
}

/**
 * Spinner for indeterminate progress
 */
export function createSpinner(message: string, stream: NodeJS.WriteStream = process.stderr): {
  update: (msg: string) => void;
  success: (msg: string) => void;
  fail: (msg: string) => void;
  stop: () => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;
  let currentMessage = message;
  let interval: ReturnType<typeof setInterval> | null = null;

  function render(): void {
    const frame = color.cyan(frames[frameIndex] ?? '⠋');
    stream.write(`\r${frame} ${currentMessage}\x1b[K`);
    frameIndex = (frameIndex + 1) % frames.length;
  }

  // Start spinner
  interval = setInterval(render, 80);
  render();

  return {
    update(msg: string) {
      currentMessage = msg;
    },
    success(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.green('✓')} ${msg}\x1b[K\n`);
    },
    fail(msg: string) {
      if (interval) clearInterval(interval);
      stream.write(`\r${color.red('✗')} ${msg}\x1b[K\n`);
    },
    stop() {
      if (interval) clearInterval(interval);
      stream.write('\r\x1b[K');
    },
  };
}

/**
 * Format bytes as human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(1024));
  const value = bytes / Math.pow(1024, i);
  return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i] ?? 'B'}`;
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format table data
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns || (firstRow ? Object.keys(firstRow) : []);

  // Calculate column widths
  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const value = String(row[col] ?? '');
      const stripped = stripAnsi(value);
      const currentWidth = widths[col] ?? 0;
      widths[col] = Math.max(currentWidth, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  // Header
  if (header) {
    const headerLine = cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad);
    lines.push(`    ${headerLine}`);
    const separator = cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad);
    lines.push(`    ${separator}`);
  }

  // Rows
  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const stripped = stripAnsi(value);
        const padLength = (widths[col] ?? 0) - stripped.length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

/** Name of the JSON configuration file looked up in cwd, then home */
export const CONFIG_FILE_NAME = '.pageviewsrc';

/** Options every pipeline command accepts */
export interface ConfigOptions {
  config?: string;
  dataDir?: string;
  companies?: string;
  domain?: string;
  databaseUrl?: string;
}

/**
 * Add the configuration options shared by all pipeline commands
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', `Configuration file (default: ./${CONFIG_FILE_NAME}, then ~/${CONFIG_FILE_NAME})`)
    .option('-d, --data-dir <path>', 'Data directory')
    .option('--companies <path>', 'Company mapping JSON file')
    .option('--domain <code>', 'Wikipedia edition to keep (e.g. en)')
    .option('--database-url <url>', 'PostgreSQL connection string');
}

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a JSON configuration file.
 *
 * @returns The parsed object, or null when the file does not exist
 * @throws {ConfigError} If the file exists but is not a JSON object
 */
export async function readConfigFile(path: string): Promise<ConfigLayer | null> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Configuration values from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const config: ConfigLayer = {};
  const database: ConfigLayer = {};

  if (env['PAGEVIEWS_DATA_DIR']) config['dataDir'] = env['PAGEVIEWS_DATA_DIR'];
  if (env['PAGEVIEWS_COMPANIES']) config['companiesPath'] = env['PAGEVIEWS_COMPANIES'];
  if (env['PAGEVIEWS_DOMAIN']) config['domain'] = env['PAGEVIEWS_DOMAIN'];

  if (env['DATABASE_URL']) database['url'] = env['DATABASE_URL'];
  if (env['PGHOST']) database['host'] = env['PGHOST'];
  // A non-numeric port becomes NaN and is rejected by validation
  if (env['PGPORT']) database['port'] = Number(env['PGPORT']);
  if (env['PGDATABASE']) database['database'] = env['PGDATABASE'];
  if (env['PGUSER']) database['user'] = env['PGUSER'];
  if (env['PGPASSWORD']) database['password'] = env['PGPASSWORD'];

  if (Object.keys(database).length > 0) {
    config['database'] = database;
  }
  return config;
}

/**
 * Configuration values from command-line options
 */
export function configFromOptions(options: ConfigOptions): ConfigLayer {
  const config: ConfigLayer = {};
  if (options.dataDir) config['dataDir'] = options.dataDir;
  if (options.companies) config['companiesPath'] = options.companies;
  if (options.domain) config['domain'] = options.domain;
  if (options.databaseUrl) config['database'] = { url: options.databaseUrl };
  return config;
}

/**
 * Merge layers left to right; `database` is merged one level deep
 */
export function mergeConfigLayers(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] = key === 'database' && isRecord(current) && isRecord(value)
        ? { ...current, ...value }
        : value;
    }
  }
  return merged;
}

export interface LoadConfigOptions {
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
  /** Files tried in order when no explicit config file is given; the first found wins */
  searchPaths?: string[];
}

/**
 * Load configuration from .pageviewsrc, environment and CLI options
 *
 * Configuration is loaded from (in order of precedence):
 * 1. CLI options (highest priority)
 * 2. Environment variables
 * 3. The file named by --config, else .pageviewsrc in the current directory,
 *    else .pageviewsrc in the home directory (lowest priority)
 *
 * @returns Validated pipeline configuration
 * @throws {ConfigError} If a file is unreadable or validation fails
 */
export async function loadConfig(
  options: ConfigOptions = {},
  { env = process.env, searchPaths }: LoadConfigOptions = {}
): Promise<PipelineConfig> {
  let fileConfig: ConfigLayer = {};

  if (options.config) {
    const explicit = await readConfigFile(options.config);
    if (!explicit) {
      throw new ConfigError(`Config file not found: ${options.config}`);
    }
    fileConfig = explicit;
  } else {
    const paths = searchPaths ?? [
      join(process.cwd(), CONFIG_FILE_NAME),
      join(homedir(), CONFIG_FILE_NAME),
    ];
    for (const path of paths) {
      const found = await readConfigFile(path);
      if (found) {
        getLog().debug('Loaded config file', { path });
        fileConfig = found;
        break;
      }
    }
  }

  const merged = mergeConfigLayers(fileConfig, configFromEnv(env), configFromOptions(options));

  // Validate configuration with Zod
  const result = safeValidatePipelineConfig(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/**
 * Print an error and exit with the code for its kind
 */
export function fatal(error: unknown): never {
  const message = errorMessage(error);
  const code = isTypedError(error) ? exitCodeForKind(error.kind) : 1;
  const data = isTypedError(error)
    ? { kind: error.kind, stage: error.stage, bucket: error.bucket }
    : undefined;
  if (!isTypedError(error) && error instanceof Error) {
    getLog().errorWithStack(message, error, undefined, 'fatal');
  } else {
    getLog().error(message, data, 'fatal');
  }
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(code);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  getLog().warn(message);
  console.error(`${color.warning('Warning:')} ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  getLog().info(message);
  console.log(`${color.info('Info:')} ${message}`);
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p.startsWith('/') || p.startsWith('~')) {
    return p.replace('~', homedir());
  }
  return join(process.cwd(), p);
}
