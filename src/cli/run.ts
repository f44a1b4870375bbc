/**
 * Run Command
 *
 * Process one hour end to end: fetch, extract, filter, load, summarize.
 */

import { Command } from 'commander';
import { runBucket } from '../pipeline/run.js';
import { parseTimeBucket } from '../lib/time-bucket.js';
import { writeCompanyTotals } from '../report/aggregate.js';
import { renderReport } from './report.js';
import {
  addConfigOptions,
  color,
  fatal,
  formatBytes,
  formatDuration,
  formatNumber,
  loadConfig,
  resolvePath,
  type ConfigOptions,
} from './utils.js';

interface RunOptions extends ConfigOptions {
  output?: string;
}

export const runCommand = addConfigOptions(
  new Command('run')
    .description('Fetch, extract, filter, load and summarize one hour of pageviews')
    .argument('<bucket>', 'Hour to process, as YYYY-MM-DDTHH (UTC)')
    .option('-o, --output <dir>', 'Also write analysis_company_totals.csv to this directory')
).action(async (bucketArg: string, options: RunOptions) => {
  try {
    const bucket = parseTimeBucket(bucketArg);
    const config = await loadConfig(options);
    const startTime = Date.now();

    const result = await runBucket(bucket, config);

    console.log(`\n  ${color.bold('Pipeline run')} ${color.dim(result.runId)}\n`);
    console.log(`    Dump:      ${result.fetch.path} (${formatBytes(result.fetch.bytes)}, ${result.fetch.status})`);
    console.log(`    Extracted: ${result.extract.path} (${formatBytes(result.extract.bytes)}, ${result.extract.status})`);
    console.log(`    Filtered:  ${result.filter.path} (${result.filter.status})`);
    console.log(`    Loaded:    ${formatNumber(result.rowsAffected)} rows`);
    console.log(`    Elapsed:   ${formatDuration((Date.now() - startTime) / 1000)}`);

    console.log(renderReport(result.summary, 'table', result.bucket));

    if (options.output) {
      const path = await writeCompanyTotals(result.summary, resolvePath(options.output));
      console.error(color.dim(`  Saved ${path}`));
    }
  } catch (error) {
    fatal(error);
  }
});
