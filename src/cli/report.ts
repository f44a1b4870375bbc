/**
 * Report Command
 *
 * Rank tracked companies by pageviews for a bucket or a range of buckets.
 */

import { Command } from 'commander';
import { compareBuckets, formatBucket, parseTimeBucket } from '../lib/time-bucket.js';
import { ConfigError } from '../lib/errors.js';
import {
  formatCompanyTotals,
  summarizeFilteredFile,
  summarizeRange,
  writeCompanyTotals,
  type AggregateResult,
} from '../report/aggregate.js';
import { PostgresPageviewStore } from '../storage/postgres.js';
import type { StoredRow } from '../storage/types.js';
import {
  addConfigOptions,
  color,
  fatal,
  formatNumber,
  formatTable,
  loadConfig,
  resolvePath,
  type ConfigOptions,
} from './utils.js';

export type ReportFormat = 'table' | 'json' | 'csv';

const REPORT_FORMATS: readonly ReportFormat[] = ['table', 'json', 'csv'];

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

interface ReportOptions extends ConfigOptions {
  to?: string;
  format: string;
  top: string;
  output?: string;
  file?: string;
  rows: boolean;
}

/**
 * Line naming the company with the most views, or null for an empty result
 */
export function winnerLine(result: AggregateResult): string | null {
  const winner = result.companies[0];
  if (!winner) {
    return null;
  }
  return `HIGHEST PAGEVIEWS: ${winner.company} with ${formatNumber(winner.totalViews)} views`;
}

/**
 * Render a summary in the requested format
 */
export function renderReport(result: AggregateResult, format: ReportFormat, label: string): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2);
    case 'csv':
      return formatCompanyTotals(result).trimEnd();
    case 'table': {
      if (result.companies.length === 0) {
        return `  No pageviews stored for ${label}`;
      }
      const rows = result.companies.map((company, index) => ({
        Rank: String(index + 1),
        Company: company.company,
        Views: formatNumber(company.totalViews),
        'Top pages': company.topPages.map((p) => p.pageTitle).join(', '),
      }));
      const lines = [
        `\n  ${color.bold(`Pageviews for ${label}`)}\n`,
        formatTable(rows, ['Rank', 'Company', 'Views', 'Top pages']),
        '',
        `  ${color.success(winnerLine(result) ?? '')}`,
      ];
      return lines.join('\n');
    }
  }
}

function renderRows(rows: readonly StoredRow[]): string {
  return formatTable(
    rows.map((row) => ({
      Hour: row.execution_date,
      Company: row.company,
      Page: row.page_title,
      Views: formatNumber(row.view_count),
    })),
    ['Hour', 'Company', 'Page', 'Views']
  );
}

export const reportCommand = addConfigOptions(
  new Command('report')
    .description('Rank tracked companies by pageviews')
    .argument('<bucket>', 'First (or only) hour, as YYYY-MM-DDTHH (UTC)')
    .option('-t, --to <bucket>', 'Last hour of an inclusive range')
    .option('--format <format>', `Output format (${REPORT_FORMATS.join(', ')})`, 'table')
    .option('-n, --top <count>', 'Pages listed per company', '5')
    .option('-o, --output <dir>', 'Also write analysis_company_totals.csv to this directory')
    .option('-f, --file <path>', 'Summarize a filtered CSV instead of the database')
    .option('--rows', 'List the stored rows instead of the ranking', false)
).action(async (bucketArg: string, options: ReportOptions) => {
  try {
    if (!isReportFormat(options.format)) {
      throw new ConfigError(`Invalid format: ${options.format}. Valid formats: ${REPORT_FORMATS.join(', ')}`);
    }
    const format = options.format;
    const topN = parseInt(options.top, 10);
    if (!Number.isInteger(topN) || topN < 1) {
      throw new ConfigError(`Invalid --top value: ${options.top}`);
    }

    const from = parseTimeBucket(bucketArg);
    const to = options.to ? parseTimeBucket(options.to) : from;
    if (compareBuckets(from, to) > 0) {
      throw new ConfigError(`Range end ${formatBucket(to)} is before its start ${formatBucket(from)}`);
    }
    const label = options.to ? `${formatBucket(from)} .. ${formatBucket(to)}` : formatBucket(from);

    const config = await loadConfig(options);

    let result: AggregateResult;
    if (options.file) {
      result = await summarizeFilteredFile(resolvePath(options.file), topN);
    } else {
      const store = new PostgresPageviewStore(config.database);
      try {
        if (options.rows) {
          console.log(renderRows(await store.listRows({ from, to })));
          return;
        }
        result = await summarizeRange(store, from, to, topN);
      } finally {
        await store.close();
      }
    }

    console.log(renderReport(result, format, label));

    if (options.output) {
      const path = await writeCompanyTotals(result, resolvePath(options.output));
      console.error(color.dim(`  Saved ${path}`));
    }
  } catch (error) {
    fatal(error);
  }
});
