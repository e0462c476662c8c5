/**
 * Part discovery
 *
 * Finds the part files of a book in a directory. Parts are named
 * "<Book Name> (<n>).<ext>" and combined in order of n.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DiscoveryError } from '@bookbinder/core';
import { createLogger } from '@bookbinder/utils';

const log = createLogger({ component: 'discovery' });

export const PART_EXTENSIONS = ['mp3', 'm4a', 'm4b'] as const;

const PART_PATTERN = /^(.+?)\s*\((\d+)\)\.(mp3|m4a|m4b)$/i;

export interface PartName {
  bookName: string;
  partNumber: number;
  extension: string;
}

export interface DiscoveredBook {
  bookName: string;
  directory: string;
  /** Absolute part paths in combine order */
  parts: string[];
  /** "<Book Name>.m4b" beside the parts */
  outputPath: string;
}

export function parsePartName(fileName: string): PartName | null {
  const match = PART_PATTERN.exec(fileName);
  if (!match) return null;

  const [, bookName, number, extension] = match;
  if (bookName === undefined || number === undefined || extension === undefined) return null;

  return {
    bookName: bookName.trim(),
    partNumber: Number.parseInt(number, 10),
    extension: extension.toLowerCase(),
  };
}

/**
 * The book is named after the first part file (by name); only parts of that
 * book are returned.
 */
export function selectBookParts(fileNames: readonly string[]): { bookName: string; parts: string[] } {
  const candidates = fileNames
    .map((fileName) => ({ fileName, part: parsePartName(fileName) }))
    .filter((entry): entry is { fileName: string; part: PartName } => entry.part !== null)
    .sort((a, b) => a.fileName.localeCompare(b.fileName));

  const first = candidates[0];
  if (!first) {
    throw new DiscoveryError('No part files found (expected "<Book Name> (<n>).mp3|m4a|m4b")');
  }

  const bookName = first.part.bookName;
  const book = candidates
    .filter((entry) => entry.part.bookName === bookName)
    .sort((a, b) => a.part.partNumber - b.part.partNumber);

  for (let i = 1; i < book.length; i++) {
    const previous = book[i - 1];
    const current = book[i];
    if (previous && current && previous.part.partNumber === current.part.partNumber) {
      throw new DiscoveryError(
        `Part number ${current.part.partNumber} appears twice: '${previous.fileName}' and '${current.fileName}'`,
        { bookName, partNumber: current.part.partNumber }
      );
    }
  }

  const others = candidates.length - book.length;
  if (others > 0) {
    log.warn({ bookName, ignored: others }, 'Ignoring part files of other books');
  }

  return { bookName, parts: book.map((entry) => entry.fileName) };
}

export async function discoverBook(directory: string): Promise<DiscoveredBook> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    throw new DiscoveryError(
      `Cannot read directory '${directory}': ${error instanceof Error ? error.message : String(error)}`,
      { directory }
    );
  }

  const { bookName, parts } = selectBookParts(entries);
  log.info({ bookName, parts: parts.length }, 'Discovered parts');

  return {
    bookName,
    directory,
    parts: parts.map((fileName) => join(directory, fileName)),
    outputPath: join(directory, `${bookName}.m4b`),
  };
}
