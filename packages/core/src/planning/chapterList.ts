/**
 * Chapter list parsing for re-chaptering an existing audiobook.
 *
 * Each line holds a title followed by that chapter's duration:
 *
 *   Opening Credits 00:17.90
 *   Prologue 06:06.25
 *   Chapter One 01:02:11.00
 */

import { parseTimecode } from '@bookbinder/utils';
import { InvalidParameterError } from '../errors/index.js';
import type { ChapterSpec } from '../types/plan.js';
import { buildTimeline } from './timeline.js';

export interface ChapterListEntry {
  title: string;
  duration: number; // seconds
}

const ENTRY_PATTERN = /^(.*?)\s+(\d{1,2}:\d{2}(?::\d{2})?(?:\.\d+)?)$/;

export function parseChapterList(text: string): ChapterListEntry[] {
  const entries: ChapterListEntry[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }

    const match = ENTRY_PATTERN.exec(line);
    const title = match?.[1]?.trim();
    const timecode = match?.[2];
    if (!title || !timecode) {
      throw new InvalidParameterError(
        `chapter list line ${i + 1}`,
        line,
        'a title followed by a duration, e.g. "Opening Credits 00:17.90"',
        'chapters'
      );
    }

    const duration = parseTimecode(timecode);
    if (duration <= 0) {
      throw new InvalidParameterError(
        `chapter list line ${i + 1}`,
        line,
        'a duration greater than zero',
        'chapters'
      );
    }

    entries.push({ title, duration });
  });

  return entries;
}

/**
 * Parse a chapter list and lay it out as a contiguous timeline
 */
export function chapterListToTimeline(text: string): ChapterSpec[] {
  const entries = parseChapterList(text);
  if (entries.length === 0) {
    throw new InvalidParameterError('chapter list', text.slice(0, 80), 'at least one chapter line', 'chapters');
  }
  return buildTimeline(
    entries.map((e) => e.duration),
    entries.map((e) => e.title)
  );
}
