/**
 * Extract Command
 *
 * Decompress a downloaded dump into the processed directory.
 */

import { Command } from 'commander';
import { extractForBucket } from '../ingest/decompress.js';
import { parseTimeBucket } from '../lib/time-bucket.js';
import { addConfigOptions, createSpinner, fatal, formatBytes, loadConfig, type ConfigOptions } from './utils.js';

export const extractCommand = addConfigOptions(
  new Command('extract')
    .description('Decompress the downloaded dump for a time bucket')
    .argument('<bucket>', 'Hour to extract, as YYYY-MM-DDTHH (UTC)')
).action(async (bucketArg: string, options: ConfigOptions) => {
  try {
    const bucket = parseTimeBucket(bucketArg);
    const config = await loadConfig(options);

    const spinner = createSpinner('Extracting dump...');
    try {
      const result = await extractForBucket(bucket, config);
      spinner.success(
        result.status === 'skipped'
          ? `Already extracted ${result.path} (${formatBytes(result.bytes)})`
          : `Extracted ${result.path} (${formatBytes(result.bytes)})`
      );
    } catch (error) {
      spinner.fail('Extraction failed');
      throw error;
    }
  } catch (error) {
    fatal(error);
  }
});
