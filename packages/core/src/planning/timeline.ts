/**
 * Timeline Builder
 *
 * Turns ordered part durations into contiguous chapter markers.
 * Offsets accumulate in input order, so each chapter's end is the
 * very same number as the next chapter's start.
 */

import { LengthMismatchError } from '../errors/index.js';
import type { ChapterSpec } from '../types/plan.js';

export function buildTimeline(
  durations: readonly number[],
  titles: readonly string[]
): ChapterSpec[] {
  if (durations.length !== titles.length) {
    throw new LengthMismatchError('durations vs titles', durations.length, titles.length);
  }

  const chapters: ChapterSpec[] = [];
  let offset = 0;

  durations.forEach((duration, i) => {
    const start = offset;
    const end = start + duration;
    chapters.push({ index: i + 1, title: titles[i] ?? '', start, end });
    offset = end;
  });

  return chapters;
}

export function totalDuration(chapters: readonly ChapterSpec[]): number {
  return chapters.at(-1)?.end ?? 0;
}
