/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { fetchCommand } from './fetch.js';
export { extractCommand } from './extract.js';
export { filterCommand } from './filter.js';
export { loadCommand } from './load.js';
export { reportCommand, renderReport, winnerLine } from './report.js';
export { runCommand } from './run.js';

// Utilities
export {
  color,
  supportsColor,
  stripAnsi,
  createProgressBar,
  createSpinner,
  formatBytes,
  formatDuration,
  formatNumber,
  formatTable,
  addConfigOptions,
  configFromEnv,
  configFromOptions,
  mergeConfigLayers,
  readConfigFile,
  loadConfig,
  fatal,
  warn,
  info,
  resolvePath,
  CONFIG_FILE_NAME,
} from './utils.js';

export type { ProgressBarConfig, ConfigOptions, LoadConfigOptions } from './utils.js';
export type { ReportFormat } from './report.js';
