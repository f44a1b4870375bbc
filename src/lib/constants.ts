/**
 * Centralized constants for the pageviews pipeline
 *
 * Magic numbers and defaults shared across modules. Import from here to keep
 * them consistent.
 */

// ============================================================================
// Source
// ============================================================================

/** Where Wikimedia publishes the hourly pageview dumps */
export const PAGEVIEWS_BASE_URL = 'https://dumps.wikimedia.org/other/pageviews';

/** Default Wikipedia edition to keep */
export const DEFAULT_DOMAIN = 'en';

// ============================================================================
// Filtering
// ============================================================================

/** Log progress every this many dump lines */
export const PROGRESS_LINE_INTERVAL = 1_000_000;

/** Bytes read from the dump per chunk */
export const READ_CHUNK_BYTES = 1024 * 1024;

/** Header of the filtered artifact */
export const FILTERED_COLUMNS = ['company', 'page_title', 'view_count', 'domain'] as const;

// ============================================================================
// Storage
// ============================================================================

/** Persisted table name */
export const PAGEVIEWS_TABLE = 'wikipedia_pageviews';

/** Rows per INSERT statement; 5 parameters per row stays far below the 65535 limit */
export const UPSERT_CHUNK_ROWS = 1000;

// ============================================================================
// Reporting
// ============================================================================

/** Page titles retained per company in a summary */
export const TOP_PAGES_LIMIT = 5;

/** File written by the report stage */
export const COMPANY_TOTALS_FILE = 'analysis_company_totals.csv';

// ============================================================================
// Retry Configuration
// ============================================================================

/** Default maximum number of download retry attempts */
export const DEFAULT_MAX_RETRIES = 3;

/** Default delay before the first retry in milliseconds (doubles each retry) */
export const DEFAULT_RETRY_DELAY_MS = 1000;

/** Download progress reporting interval in milliseconds */
export const PROGRESS_INTERVAL_MS = 100;
