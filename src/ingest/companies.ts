/**
 * Company directory: company name ↔ canonical Wikipedia page title
 */

import { readFile } from 'node:fs/promises';
import { CompanyMappingSchema, formatValidationError } from '../lib/config-schema.js';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

/**
 * Immutable 1:1 mapping between tracked companies and their page titles.
 *
 * The reverse view (page title → company) is built once, so that the filter
 * can resolve each dump line in constant time.
 */
export class CompanyDirectory {
  private readonly pageToCompany: ReadonlyMap<string, string>;
  private readonly companyToPage: ReadonlyMap<string, string>;

  private constructor(entries: ReadonlyArray<readonly [company: string, page: string]>) {
    this.companyToPage = new Map(entries);
    this.pageToCompany = new Map(entries.map(([company, page]) => [page, company]));
  }

  /**
   * Build a directory from an in-memory `{ company: pageTitle }` record
   *
   * @throws {ConfigError} On empty names or a page title shared by two companies
   */
  static fromRecord(mapping: unknown, source = 'mapping'): CompanyDirectory {
    const result = CompanyMappingSchema.safeParse(mapping);
    if (!result.success) {
      throw new ConfigError(
        `Invalid company mapping in ${source}:\n${formatValidationError(result.error)}`
      );
    }
    return new CompanyDirectory(Object.entries(result.data));
  }

  /** Company owning a page title, if tracked */
  companyForPage(pageTitle: string): string | undefined {
    return this.pageToCompany.get(pageTitle);
  }

  pageForCompany(company: string): string | undefined {
    return this.companyToPage.get(company);
  }

  get companies(): string[] {
    return [...this.companyToPage.keys()];
  }

  get size(): number {
    return this.companyToPage.size;
  }
}

/**
 * Load the company directory from a JSON document
 *
 * @param path - File containing `{ "<Company>": "<Page_Title>", ... }`
 * @throws {ConfigError} If the file is unreadable, not JSON, or not a valid mapping
 */
export async function loadCompanyDirectory(path: string): Promise<CompanyDirectory> {
  const log = loggers.filter;

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    log.error('Failed to read companies config', { path, error: errorMessage(error) });
    throw new ConfigError(`Cannot read companies config ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Companies config ${path} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const directory = CompanyDirectory.fromRecord(parsed, path);
  log.info('Loaded companies from config', { path, companies: directory.size });
  return directory;
}
