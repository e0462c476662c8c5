import { describe, expect, it } from 'vitest';
import type { ChapterNode } from '@bookbinder/media';
import { renderChapterTree } from '../src/commands/chapters.js';

describe('renderChapterTree', () => {
  it('indents children under their parent', () => {
    const tree: ChapterNode[] = [
      {
        id: 0,
        title: 'Book One',
        startTime: 0,
        endTime: 3725.5,
        children: [{ id: 1, title: 'Chapter 1', startTime: 0, endTime: 90, children: [] }],
      },
    ];

    expect(renderChapterTree(tree)).toEqual([
      '- Book One (start 0:00.00, duration 1:02:05.50)',
      '  - Chapter 1 (start 0:00.00, duration 1:30.00)',
    ]);
  });
});
