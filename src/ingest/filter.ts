/**
 * Company page filter
 *
 * Scans a decompressed hourly dump and keeps the records of tracked company
 * pages in one Wikipedia edition:
 *
 *   dump lines -> parsePageviewLine -> domain filter -> page lookup -> CSV
 *
 * Memory is bounded by the number of matches, not by the dump size.
 */

import type { PipelineConfig } from '../lib/config-schema.js';
import { PROGRESS_LINE_INTERVAL } from '../lib/constants.js';
import { InputNotFoundError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { extractedDumpPath, fileSize, filteredPath, openInput } from '../lib/paths.js';
import { formatBucket, type TimeBucket } from '../lib/time-bucket.js';
import { loadCompanyDirectory, type CompanyDirectory } from './companies.js';
import { writeFilteredFile } from './filtered-file.js';
import { parsePageviewLine, readLines } from './parse-pageviews.js';
import type { FilterOptions, FilterResult, FilterStats, FilteredRecord } from './types.js';

/**
 * Filter a dump to the pages of tracked companies.
 *
 * If `outputPath` already exists the scan is skipped and the existing
 * artifact is returned as is, so a rerun after a partial pipeline failure
 * never reprocesses the dump. Otherwise the artifact is always written, with
 * only the header when nothing matched.
 *
 * @param inputPath - Decompressed dump
 * @param outputPath - Filtered CSV to produce
 * @param directory - Tracked companies
 * @param domainFilter - Edition to keep, e.g. `en`
 * @throws {InputNotFoundError} If the dump cannot be opened as a regular file
 */
export async function filterPageviews(
  inputPath: string,
  outputPath: string,
  directory: CompanyDirectory,
  domainFilter: string,
  options: FilterOptions = {}
): Promise<FilterResult> {
  const log = loggers.filter.withFields({ path: inputPath });
  const { progressInterval = PROGRESS_LINE_INTERVAL, onProgress } = options;

  const existing = await fileSize(outputPath);
  if (existing !== null) {
    log.info('Filtered file already exists', { output: outputPath, bytes: existing });
    return { path: outputPath, status: 'skipped', bytes: existing };
  }

  const input = await openInput(inputPath, 'filter');

  log.info('Processing file', { domain: domainFilter, companies: directory.size });

  const startTime = Date.now();
  const stats: FilterStats = { linesRead: 0, malformedLines: 0, matches: 0, elapsedMs: 0 };
  const matched: FilteredRecord[] = [];

  try {
    for await (const line of readLines(input)) {
      stats.linesRead++;

      if (stats.linesRead % progressInterval === 0) {
        stats.elapsedMs = Date.now() - startTime;
        log.info('Filter progress', { lines: stats.linesRead, matches: stats.matches });
        onProgress?.({ ...stats });
      }

      const record = parsePageviewLine(line);
      if (!record) {
        stats.malformedLines++;
        continue;
      }

      if (record.domain !== domainFilter) {
        continue;
      }

      const company = directory.companyForPage(record.pageTitle);
      if (company === undefined) {
        continue;
      }

      matched.push({
        company,
        pageTitle: record.pageTitle,
        viewCount: record.viewCount,
        domain: record.domain,
      });
      stats.matches++;
    }
  } catch (error) {
    log.error('Filtering failed', { error: errorMessage(error) });
    throw error;
  }

  stats.elapsedMs = Date.now() - startTime;
  log.info('Filtering complete', {
    lines: stats.linesRead,
    malformed: stats.malformedLines,
    matches: stats.matches,
    elapsedMs: stats.elapsedMs,
  });

  try {
    await writeFilteredFile(outputPath, matched);
  } catch (error) {
    log.error('Writing filtered file failed', { output: outputPath, error: errorMessage(error) });
    throw error;
  }

  const bytes = (await fileSize(outputPath)) ?? 0;
  log.info('Saved filtered data', { output: outputPath, records: matched.length, bytes });
  return { path: outputPath, status: 'created', bytes, stats };
}

/**
 * Filter the decompressed dump of one time bucket, using the configured
 * company mapping and domain.
 *
 * @throws {ConfigError} If the company mapping cannot be loaded
 * @throws {InputNotFoundError} If the decompressed dump is missing
 */
export async function filterForBucket(
  bucket: TimeBucket,
  config: PipelineConfig,
  options: FilterOptions = {}
): Promise<FilterResult> {
  const inputPath = extractedDumpPath(bucket, config);
  const outputPath = filteredPath(bucket, config);

  const directory = await loadCompanyDirectory(config.companiesPath);

  try {
    return await filterPageviews(inputPath, outputPath, directory, config.domain, {
      progressInterval: config.progressInterval,
      ...options,
    });
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      throw new InputNotFoundError(error.message, {
        stage: 'filter',
        bucket: formatBucket(bucket),
        cause: error,
      });
    }
    throw error;
  }
}
