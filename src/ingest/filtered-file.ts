/**
 * Filtered artifact codec
 *
 * Delimited text with the header `company,page_title,view_count,domain`, one
 * record per line. Fields containing a comma, quote, CR or LF are quoted with
 * inner quotes doubled.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FILTERED_COLUMNS } from '../lib/constants.js';
import { InputNotFoundError, MalformedArtifactError } from '../lib/errors.js';
import { partialPath, pathExists, promotePartial } from '../lib/paths.js';
import type { FilteredRecord } from './types.js';

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Escape one field for delimited text
 */
export function escapeField(value: string | number): string {
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatRow(fields: ReadonlyArray<string | number>): string {
  return fields.map(escapeField).join(',');
}

/**
 * Split delimited text into rows of fields.
 *
 * Quoted fields may contain separators, doubled quotes and line breaks.
 * Blank lines are skipped.
 */
export function parseRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    if (fieldStarted || row.length > 0) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
      fieldStarted = true;
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      // CRLF: the \n ends the row
    } else {
      field += ch;
      fieldStarted = true;
    }
  }
  endRow();

  return rows;
}

/**
 * Serialize filtered records, header first. Zero records still yields the
 * header line.
 */
export function formatFilteredRecords(records: readonly FilteredRecord[]): string {
  const lines = [formatRow(FILTERED_COLUMNS)];
  for (const record of records) {
    lines.push(formatRow([record.company, record.pageTitle, record.viewCount, record.domain]));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write the filtered artifact through a `.part` file renamed into place, so
 * the final path only ever holds a complete artifact. On failure the staging
 * file is removed before the error propagates.
 */
export async function writeFilteredFile(
  path: string,
  records: readonly FilteredRecord[]
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const stagingPath = partialPath(path);
  try {
    await writeFile(stagingPath, formatFilteredRecords(records), 'utf-8');
    await promotePartial(path);
  } catch (error) {
    await rm(stagingPath, { force: true });
    throw error;
  }
}

/**
 * Parse filtered artifact text back into records
 *
 * @throws {MalformedArtifactError} On a wrong header, field count or view count
 */
export function parseFilteredRecords(text: string, source = 'filtered file'): FilteredRecord[] {
  const [header, ...rows] = parseRows(text);
  if (!header || header.join(',') !== FILTERED_COLUMNS.join(',')) {
    throw new MalformedArtifactError(
      `${source}: expected header "${FILTERED_COLUMNS.join(',')}"`
    );
  }

  return rows.map((fields, index) => {
    const [company, pageTitle, viewCount, domain] = fields;
    if (
      fields.length !== FILTERED_COLUMNS.length ||
      company === undefined ||
      pageTitle === undefined ||
      viewCount === undefined ||
      domain === undefined
    ) {
      throw new MalformedArtifactError(
        `${source}: row ${index + 2} has ${fields.length} fields, expected ${FILTERED_COLUMNS.length}`
      );
    }
    if (!/^\d+$/.test(viewCount)) {
      throw new MalformedArtifactError(
        `${source}: row ${index + 2} has non-integer view_count "${viewCount}"`
      );
    }
    return { company, pageTitle, viewCount: Number(viewCount), domain };
  });
}

/**
 * Read a filtered artifact
 *
 * @throws {InputNotFoundError} If the file does not exist
 * @throws {MalformedArtifactError} If it cannot be parsed
 */
export async function readFilteredFile(path: string): Promise<FilteredRecord[]> {
  if (!(await pathExists(path))) {
    throw new InputNotFoundError(`CSV file not found: ${path}`);
  }
  const text = await readFile(path, 'utf-8');
  return parseFilteredRecords(text, path);
}
