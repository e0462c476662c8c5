/**
 * Timeline Builder and chapter list tests
 */

import { describe, expect, it } from 'vitest';
import { InvalidParameterError, LengthMismatchError } from '../src/errors/index.js';
import { chapterListToTimeline, parseChapterList } from '../src/planning/chapterList.js';
import { buildTimeline, totalDuration } from '../src/planning/timeline.js';

describe('buildTimeline', () => {
  it('lays chapters end to end from zero', () => {
    const chapters = buildTimeline([600, 900.5, 30], ['A', 'B', 'C']);

    expect(chapters).toEqual([
      { index: 1, title: 'A', start: 0, end: 600 },
      { index: 2, title: 'B', start: 600, end: 1500.5 },
      { index: 3, title: 'C', start: 1500.5, end: 1530.5 },
    ]);
    expect(totalDuration(chapters)).toBe(1530.5);
  });

  it('keeps boundaries identical with fractional durations', () => {
    const durations = [0.1, 0.2, 0.3, 1234.567, 0.7];
    const chapters = buildTimeline(durations, durations.map((_, i) => `T${i}`));

    for (let i = 1; i < chapters.length; i++) {
      expect(chapters[i]?.start).toBe(chapters[i - 1]?.end);
    }
    expect(totalDuration(chapters)).toBe(durations.reduce((a, b) => a + b, 0));
  });

  it('rejects mismatched lengths', () => {
    expect(() => buildTimeline([1, 2], ['only one'])).toThrow(LengthMismatchError);
  });

  it('returns nothing for no parts', () => {
    expect(buildTimeline([], [])).toEqual([]);
    expect(totalDuration([])).toBe(0);
  });
});

describe('parseChapterList', () => {
  it('reads titles with MM:SS.ss and HH:MM:SS.ss durations', () => {
    const text = [
      '# chapters',
      'Opening Credits 00:17.90',
      '',
      'Chapter One: The Start 01:02:11.00',
    ].join('\n');

    expect(parseChapterList(text)).toEqual([
      { title: 'Opening Credits', duration: 17.9 },
      { title: 'Chapter One: The Start', duration: 3731 },
    ]);
  });

  it('names the malformed line', () => {
    expect(() => parseChapterList('Intro 00:10\nno duration here')).toThrow('chapter list line 2');
  });

  it('rejects a zero-length entry', () => {
    expect(() => chapterListToTimeline('Intro 00:00.00\nBody 01:00.00')).toThrow(
      'Invalid chapter list line 1: "Intro 00:00.00" (expected a duration greater than zero)'
    );
  });

  it('builds a timeline from the list', () => {
    const chapters = chapterListToTimeline('Intro 00:10\nMain 01:00');
    expect(chapters).toEqual([
      { index: 1, title: 'Intro', start: 0, end: 10 },
      { index: 2, title: 'Main', start: 10, end: 70 },
    ]);
  });

  it('rejects an empty list', () => {
    expect(() => chapterListToTimeline('# nothing\n')).toThrow(InvalidParameterError);
  });
});
