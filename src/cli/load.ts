/**
 * Load Command
 *
 * Upsert a filtered artifact into PostgreSQL.
 */

import { Command } from 'commander';
import { parseTimeBucket } from '../lib/time-bucket.js';
import { loadFilteredFile, loadForBucket } from '../storage/load.js';
import { PostgresPageviewStore } from '../storage/postgres.js';
import {
  addConfigOptions,
  createSpinner,
  fatal,
  formatNumber,
  loadConfig,
  resolvePath,
  warn,
  type ConfigOptions,
} from './utils.js';

interface LoadOptions extends ConfigOptions {
  file?: string;
}

export const loadCommand = addConfigOptions(
  new Command('load')
    .description('Load filtered pageviews for a time bucket into PostgreSQL')
    .argument('<bucket>', 'Hour the records belong to, as YYYY-MM-DDTHH (UTC)')
    .option('-f, --file <path>', 'Filtered CSV to load instead of the one in the processed directory')
).action(async (bucketArg: string, options: LoadOptions) => {
  try {
    const bucket = parseTimeBucket(bucketArg);
    const config = await loadConfig(options);
    const store = new PostgresPageviewStore(config.database);

    const spinner = createSpinner('Loading into PostgreSQL...');
    try {
      const rows = options.file
        ? await loadFilteredFile(resolvePath(options.file), bucket, store)
        : await loadForBucket(bucket, config, store);
      spinner.success(`Inserted/updated ${formatNumber(rows)} rows`);
      if (rows === 0) {
        warn(`No tracked company pages for ${bucketArg}; the table is unchanged`);
      }
    } catch (error) {
      spinner.fail('Load failed');
      throw error;
    } finally {
      await store.close();
    }
  } catch (error) {
    fatal(error);
  }
});
