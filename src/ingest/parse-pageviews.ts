/**
 * Pageview dump parsing
 *
 * Dump lines look like `en Acme_Corp 42 0`: domain, page title, view count,
 * response size. Hourly dumps run to hundreds of millions of lines and
 * always contain some garbage, so parsing never throws: a bad line is null.
 */

import { createReadStream } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { READ_CHUNK_BYTES } from '../lib/constants.js';
import type { PageviewRecord } from './types.js';

const FIELDS = /^(\S+)\s+(\S+)\s+(\S+)\s+(.*)$/;
const NON_NEGATIVE_INT = /^\d+$/;

/**
 * Parse one dump line.
 *
 * Splits on the first three whitespace runs only; whatever follows is the
 * response size field. Returns null when there are fewer than four fields or
 * when either count is not a non-negative integer.
 *
 * @example
 * ```typescript
 * parsePageviewLine('en Acme_Corp 42 1000');
 * // { domain: 'en', pageTitle: 'Acme_Corp', viewCount: 42, responseSize: 1000 }
 * parsePageviewLine('en Acme_Corp 42');
 * // null
 * ```
 */
export function parsePageviewLine(line: string): PageviewRecord | null {
  const match = FIELDS.exec(line.trim());
  if (!match) {
    return null;
  }

  const [, domain, pageTitle, viewCount, responseSize] = match;
  if (
    domain === undefined ||
    pageTitle === undefined ||
    viewCount === undefined ||
    responseSize === undefined ||
    !NON_NEGATIVE_INT.test(viewCount) ||
    !NON_NEGATIVE_INT.test(responseSize)
  ) {
    return null;
  }

  const views = Number(viewCount);
  const size = Number(responseSize);
  if (!Number.isSafeInteger(views) || !Number.isSafeInteger(size)) {
    return null;
  }

  return { domain, pageTitle, viewCount: views, responseSize: size };
}

/**
 * Stream the lines of a text file.
 *
 * Reads fixed-size chunks and only keeps the unfinished last line between
 * chunks, so memory stays bounded whatever the file size. Handles `\n` and
 * `\r\n` endings; a final line without newline is still yielded.
 *
 * An open FileHandle is read from its start and closed once the lines are
 * exhausted or iteration stops.
 */
export async function* readLines(
  source: string | FileHandle,
  chunkBytes: number = READ_CHUNK_BYTES
): AsyncGenerator<string, void, undefined> {
  const options = { encoding: 'utf-8', highWaterMark: chunkBytes } as const;
  const stream =
    typeof source === 'string'
      ? createReadStream(source, options)
      : source.createReadStream({ ...options, start: 0 });
  let remainder = '';

  for await (const chunk of stream) {
    const text = remainder + String(chunk);
    const lines = text.split('\n');
    remainder = lines.pop() ?? '';
    for (const line of lines) {
      yield line.endsWith('\r') ? line.slice(0, -1) : line;
    }
  }

  if (remainder.length > 0) {
    yield remainder.endsWith('\r') ? remainder.slice(0, -1) : remainder;
  }
}
