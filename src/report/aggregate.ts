/**
 * Company ranking over stored pageviews
 *
 * Sums views per company across one bucket or a range of buckets, orders
 * companies by total, and keeps each company's most viewed page titles.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { COMPANY_TOTALS_FILE, TOP_PAGES_LIMIT } from '../lib/constants.js';
import { loggers } from '../lib/logger.js';
import { formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import { formatRow, readFilteredFile } from '../ingest/filtered-file.js';
import type { PageTotal, PageviewStore } from '../storage/types.js';

export interface PageViews {
  pageTitle: string;
  views: number;
}

export interface CompanyTotal {
  company: string;
  totalViews: number;
  /** Most viewed pages, descending */
  topPages: PageViews[];
}

export interface AggregateResult {
  /** Descending by total views, ties by company name */
  companies: CompanyTotal[];
  /** Sum over all companies */
  totalViews: number;
}

/**
 * company → page title → views.
 *
 * A key that was never added reads as 0.
 */
export class CompanyPageViews {
  private readonly table = new Map<string, Map<string, number>>();

  add(company: string, pageTitle: string, views: number): void {
    let pages = this.table.get(company);
    if (!pages) {
      pages = new Map();
      this.table.set(company, pages);
    }
    pages.set(pageTitle, (pages.get(pageTitle) ?? 0) + views);
  }

  get(company: string, pageTitle: string): number {
    return this.table.get(company)?.get(pageTitle) ?? 0;
  }

  totalFor(company: string): number {
    let total = 0;
    for (const views of this.table.get(company)?.values() ?? []) {
      total += views;
    }
    return total;
  }

  companies(): string[] {
    return [...this.table.keys()];
  }

  pagesOf(company: string): PageViews[] {
    return [...(this.table.get(company) ?? new Map<string, number>())].map(([pageTitle, views]) => ({
      pageTitle,
      views,
    }));
  }
}

function byViewsThenName(a: { views: number; name: string }, b: { views: number; name: string }): number {
  if (b.views !== a.views) {
    return b.views - a.views;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Rank companies from per-page totals
 *
 * @param topN - Pages kept per company
 */
export function aggregatePageTotals(
  totals: Iterable<PageTotal>,
  topN: number = TOP_PAGES_LIMIT
): AggregateResult {
  const table = new CompanyPageViews();
  for (const total of totals) {
    table.add(total.company, total.pageTitle, total.views);
  }

  const companies = table
    .companies()
    .map((company) => {
      const topPages = table
        .pagesOf(company)
        .sort((a, b) =>
          byViewsThenName({ views: a.views, name: a.pageTitle }, { views: b.views, name: b.pageTitle })
        )
        .slice(0, topN);
      return { company, totalViews: table.totalFor(company), topPages };
    })
    .sort((a, b) =>
      byViewsThenName({ views: a.totalViews, name: a.company }, { views: b.totalViews, name: b.company })
    );

  const totalViews = companies.reduce((sum, c) => sum + c.totalViews, 0);
  return { companies, totalViews };
}

function logTopPages(result: AggregateResult, scope: Record<string, unknown>): void {
  const log = loggers.report;
  log.info('Summarized pageviews', { ...scope, companies: result.companies.length, totalViews: result.totalViews });
  for (const company of result.companies) {
    log.debug('Top pages', {
      company: company.company,
      pages: company.topPages.map((p) => `${p.pageTitle}=${p.views}`),
    });
  }
}

/**
 * Summarize stored rows of a single bucket.
 * No rows yields an empty result, not an error.
 */
export async function summarize(
  store: PageviewStore,
  executionDate: TimeBucket,
  topN: number = TOP_PAGES_LIMIT
): Promise<AggregateResult> {
  return summarizeRange(store, executionDate, executionDate, topN);
}

/**
 * Summarize stored rows of an inclusive bucket range
 */
export async function summarizeRange(
  store: PageviewStore,
  from: TimeBucket,
  to: TimeBucket,
  topN: number = TOP_PAGES_LIMIT
): Promise<AggregateResult> {
  const totals = await store.sumViewsByPage({ from, to });
  const result = aggregatePageTotals(totals, topN);
  logTopPages(result, { from: formatBucket(from), to: formatBucket(to) });
  return result;
}

/**
 * Summarize a filtered artifact without going through the store
 */
export async function summarizeFilteredFile(
  csvPath: string,
  topN: number = TOP_PAGES_LIMIT
): Promise<AggregateResult> {
  const records = await readFilteredFile(csvPath);
  const result = aggregatePageTotals(
    records.map((r) => ({ company: r.company, pageTitle: r.pageTitle, views: r.viewCount })),
    topN
  );
  logTopPages(result, { path: csvPath });
  return result;
}

/**
 * `company,total_views` rows in ranked order, header first
 */
export function formatCompanyTotals(result: AggregateResult): string {
  const lines = [formatRow(['company', 'total_views'])];
  for (const company of result.companies) {
    lines.push(formatRow([company.company, company.totalViews]));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write the ranked company totals to `<outputDir>/analysis_company_totals.csv`
 *
 * @returns Path of the written file
 */
export async function writeCompanyTotals(result: AggregateResult, outputDir: string): Promise<string> {
  const path = join(outputDir, COMPANY_TOTALS_FILE);
  await mkdir(outputDir, { recursive: true });
  await writeFile(path, formatCompanyTotals(result), 'utf-8');
  loggers.report.info('Saved company totals', { path, companies: result.companies.length });
  return path;
}
