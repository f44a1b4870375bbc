/**
 * Reporting - company rankings over stored or filtered pageviews
 */

export type { AggregateResult, CompanyTotal, PageViews } from './aggregate.js';

export {
  CompanyPageViews,
  aggregatePageTotals,
  summarize,
  summarizeRange,
  summarizeFilteredFile,
  formatCompanyTotals,
  writeCompanyTotals,
} from './aggregate.js';
