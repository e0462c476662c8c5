/**
 * FFMETADATA1 writer
 *
 * Global tags followed by one [CHAPTER] section per chapter, timed in
 * milliseconds.
 */

import type { ChapterSpec } from '@bookbinder/core';
import { secondsToMillis } from '@bookbinder/utils';

export const FFMETADATA_HEADER = ';FFMETADATA1';

/**
 * Escape the characters ffmetadata treats specially; line breaks are dropped
 */
export function escapeMetadataValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/=/g, '\\=')
    .replace(/;/g, '\\;')
    .replace(/#/g, '\\#')
    .replace(/\r?\n/g, ' ');
}

export function toFFMetadata(
  tags: Readonly<Record<string, string>>,
  chapters: readonly ChapterSpec[]
): string {
  let output = `${FFMETADATA_HEADER}\n`;

  for (const [key, value] of Object.entries(tags)) {
    output += `${escapeMetadataValue(key)}=${escapeMetadataValue(value)}\n`;
  }

  for (const chapter of chapters) {
    output += '\n[CHAPTER]\n';
    output += 'TIMEBASE=1/1000\n';
    output += `START=${secondsToMillis(chapter.start)}\n`;
    output += `END=${secondsToMillis(chapter.end)}\n`;
    output += `title=${escapeMetadataValue(chapter.title)}\n`;
  }

  return output;
}

/**
 * Lines for an ffmpeg concat demuxer list
 */
export function toConcatList(paths: readonly string[]): string {
  return paths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}
