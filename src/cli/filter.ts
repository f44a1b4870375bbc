/**
 * Filter Command
 *
 * Keep the records of tracked company pages from a decompressed dump.
 */

import { Command } from 'commander';
import { filterForBucket } from '../ingest/filter.js';
import { parseTimeBucket } from '../lib/time-bucket.js';
import {
  addConfigOptions,
  color,
  createSpinner,
  fatal,
  formatDuration,
  formatNumber,
  loadConfig,
  type ConfigOptions,
} from './utils.js';

export const filterCommand = addConfigOptions(
  new Command('filter')
    .description('Filter a decompressed dump down to tracked company pages')
    .argument('<bucket>', 'Hour to filter, as YYYY-MM-DDTHH (UTC)')
).action(async (bucketArg: string, options: ConfigOptions) => {
  try {
    const bucket = parseTimeBucket(bucketArg);
    const config = await loadConfig(options);

    const spinner = createSpinner(`Filtering ${color.cyan(config.domain)} pageviews...`);
    try {
      const result = await filterForBucket(bucket, config, {
        onProgress: (stats) => {
          spinner.update(
            `Filtering: ${formatNumber(stats.linesRead)} lines, ${formatNumber(stats.matches)} matches`
          );
        },
      });

      if (result.status === 'skipped' || !result.stats) {
        spinner.success(`Already filtered ${result.path}`);
        return;
      }

      const { linesRead, malformedLines, matches, elapsedMs } = result.stats;
      spinner.success(
        `Filtered ${formatNumber(linesRead)} lines in ${formatDuration(elapsedMs / 1000)}: ` +
          `${formatNumber(matches)} matches, ${formatNumber(malformedLines)} malformed`
      );
      console.log(`  Output: ${result.path}`);
    } catch (error) {
      spinner.fail('Filtering failed');
      throw error;
    }
  } catch (error) {
    fatal(error);
  }
});
