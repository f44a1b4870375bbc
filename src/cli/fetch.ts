/**
 * Fetch Command
 *
 * Download the hourly pageview dump of one bucket into the raw directory.
 */

import { Command } from 'commander';
import { downloadPageviews, pageviewsUrl } from '../ingest/download.js';
import type { StageResult } from '../ingest/types.js';
import { ConfigError } from '../lib/errors.js';
import { rawDumpPath } from '../lib/paths.js';
import { parseTimeBucket } from '../lib/time-bucket.js';
import {
  addConfigOptions,
  color,
  createProgressBar,
  createSpinner,
  fatal,
  formatBytes,
  formatDuration,
  info,
  loadConfig,
  type ConfigOptions,
} from './utils.js';

type ProgressBar = ReturnType<typeof createProgressBar>;

interface FetchOptions extends ConfigOptions {
  retries: string;
  dryRun: boolean;
}

export const fetchCommand = addConfigOptions(
  new Command('fetch')
    .description('Download the hourly pageviews dump for a time bucket')
    .argument('<bucket>', 'Hour to fetch, as YYYY-MM-DDTHH (UTC)')
    .option('-r, --retries <count>', 'Retries after a failed download', '3')
    .option('--dry-run', 'Print the URL and destination without downloading', false)
).action(async (bucketArg: string, options: FetchOptions) => {
  try {
    const bucket = parseTimeBucket(bucketArg);
    const maxRetries = parseInt(options.retries, 10);
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigError(`Invalid --retries value: ${options.retries}`);
    }
    const config = await loadConfig(options);
    const url = pageviewsUrl(bucket, config.pageviewsBaseUrl);
    const destination = rawDumpPath(bucket, config);

    if (options.dryRun) {
      console.log(`  URL:         ${url}`);
      console.log(`  Destination: ${destination}`);
      info('Dry run, nothing downloaded');
      return;
    }

    const startTime = Date.now();
    const display: { bar?: ProgressBar } = {};
    const spinner = createSpinner(`Downloading ${color.cyan(url)}`);

    let result: StageResult;
    try {
      result = await downloadPageviews(bucket, config, {
        maxRetries,
        onProgress: (progress) => {
          if (progress.totalBytes === undefined) {
            spinner.update(`Downloading ${formatBytes(progress.bytesDownloaded)}`);
            return;
          }
          if (!display.bar) {
            spinner.stop();
            display.bar = createProgressBar({ total: progress.totalBytes });
          }
          display.bar.update(progress.bytesDownloaded);
        },
      });
    } catch (error) {
      spinner.fail('Download failed');
      throw error;
    }
    display.bar?.complete();

    const elapsed = formatDuration((Date.now() - startTime) / 1000);
    if (result.status === 'skipped') {
      spinner.success(`Already downloaded ${result.path} (${formatBytes(result.bytes)})`);
    } else {
      spinner.success(`Downloaded ${result.path} (${formatBytes(result.bytes)}) in ${elapsed}`);
    }
  } catch (error) {
    fatal(error);
  }
});
