/**
 * DDL for the pageviews table. Mirrors sql/create_tables.sql.
 */

import { PAGEVIEWS_TABLE } from '../lib/constants.js';

export const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS ${PAGEVIEWS_TABLE} (
    id SERIAL PRIMARY KEY,
    company VARCHAR(100) NOT NULL,
    page_title VARCHAR(255) NOT NULL,
    view_count INTEGER NOT NULL,
    domain VARCHAR(100) NOT NULL,
    execution_date TIMESTAMP NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    UNIQUE (company, execution_date)
)`;

export const CREATE_INDEXES_SQL = [
  `CREATE INDEX IF NOT EXISTS idx_pageviews_company ON ${PAGEVIEWS_TABLE} (company)`,
  `CREATE INDEX IF NOT EXISTS idx_pageviews_execution_date ON ${PAGEVIEWS_TABLE} (execution_date)`,
  `CREATE INDEX IF NOT EXISTS idx_pageviews_view_count ON ${PAGEVIEWS_TABLE} (view_count)`,
] as const;

export const COMMENTS_SQL = [
  `COMMENT ON TABLE ${PAGEVIEWS_TABLE} IS 'Hourly Wikipedia pageview counts for tracked companies'`,
  `COMMENT ON COLUMN ${PAGEVIEWS_TABLE}.company IS 'Company name from the companies config'`,
  `COMMENT ON COLUMN ${PAGEVIEWS_TABLE}.page_title IS 'Wikipedia page title associated with the company'`,
  `COMMENT ON COLUMN ${PAGEVIEWS_TABLE}.view_count IS 'Number of pageviews recorded during the hour'`,
  `COMMENT ON COLUMN ${PAGEVIEWS_TABLE}.execution_date IS 'Hour the pageviews were collected (UTC)'`,
] as const;

/**
 * Multi-row upsert for `rowCount` rows of
 * (company, page_title, view_count, domain, execution_date).
 * A re-load of the same (company, execution_date) overwrites in place.
 */
export function buildUpsertSql(rowCount: number): string {
  const values: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const base = row * 5;
    values.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`);
  }

  return `INSERT INTO ${PAGEVIEWS_TABLE}
    (company, page_title, view_count, domain, execution_date)
VALUES ${values.join(', ')}
ON CONFLICT (company, execution_date)
DO UPDATE SET
    view_count = EXCLUDED.view_count,
    page_title = EXCLUDED.page_title,
    domain = EXCLUDED.domain`;
}

export const SUM_BY_PAGE_SQL = `
SELECT company, page_title, SUM(view_count) AS views
FROM ${PAGEVIEWS_TABLE}
WHERE execution_date BETWEEN $1 AND $2
GROUP BY company, page_title`;

export const LIST_ROWS_SQL = `
SELECT id, company, page_title, view_count, domain,
       to_char(execution_date, 'YYYY-MM-DD HH24:MI:SS') AS execution_date,
       created_at
FROM ${PAGEVIEWS_TABLE}
WHERE execution_date BETWEEN $1 AND $2
ORDER BY execution_date, company`;
