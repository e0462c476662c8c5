/**
 * Chapter Title Resolver
 *
 * Produces one display title per part, either read from a titles file
 * or generated as "Part n" / "Chapter n".
 */

import { readFile } from 'node:fs/promises';
import { createLogger, isPositiveInteger } from '@bookbinder/utils';
import { InvalidParameterError, TitleCountMismatchError } from '../errors/index.js';

const log = createLogger({ component: 'chapter-titles' });

export const DEFAULT_CHAPTER_THRESHOLD = 6;

// "12. Title" -> "Title"; "3.14 Pi" is left alone
const NUMBERING_PREFIX = /^\d+\.(\s+|$)/;

export interface TitleOptions {
  /** Parts with fewer than this many files are labelled "Part", otherwise "Chapter" */
  threshold?: number;
  /** Contents of a titles file, one title per line */
  titlesText?: string;
}

export function stripNumberingPrefix(line: string): string {
  const stripped = line.replace(NUMBERING_PREFIX, '').trim();
  return stripped.length > 0 ? stripped : line;
}

/**
 * Parse a titles file: one title per non-blank line, numbering removed
 */
export function parseTitles(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(stripNumberingPrefix);
}

export function generateTitles(count: number, threshold: number = DEFAULT_CHAPTER_THRESHOLD): string[] {
  const label = count < threshold ? 'Part' : 'Chapter';
  return Array.from({ length: count }, (_, i) => `${label} ${i + 1}`);
}

export async function readTitlesFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.error({ filePath, reason }, 'Failed to read chapter titles file');
    throw new InvalidParameterError('chapter titles file', filePath, 'a readable UTF-8 text file', 'titles');
  }
}

/**
 * Resolve the ordered display titles for `count` parts
 */
export function resolveChapterTitles(count: number, options: TitleOptions = {}): string[] {
  const threshold = options.threshold ?? DEFAULT_CHAPTER_THRESHOLD;
  if (!isPositiveInteger(threshold)) {
    throw new InvalidParameterError('chapter threshold', threshold, 'a positive integer', 'titles');
  }

  if (options.titlesText === undefined) {
    const titles = generateTitles(count, threshold);
    log.debug({ count, threshold, label: titles[0]?.split(' ')[0] }, 'Generated chapter titles');
    return titles;
  }

  const titles = parseTitles(options.titlesText);
  if (titles.length !== count) {
    throw new TitleCountMismatchError(count, titles.length);
  }
  log.info({ count: titles.length }, 'Read chapter titles');
  return titles;
}
