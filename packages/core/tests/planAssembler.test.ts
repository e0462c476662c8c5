/**
 * Plan Assembler tests
 */

import { describe, expect, it, vi } from 'vitest';
import {
  EncodeError,
  LengthMismatchError,
  PlanInvariantError,
} from '../src/errors/index.js';
import {
  assemblePlan,
  describeEncoding,
  executePlan,
  renderPlan,
  type PlanParts,
} from '../src/planning/planAssembler.js';
import { buildTimeline } from '../src/planning/timeline.js';
import type { CombineMuxer, MuxRequest } from '../src/types/plan.js';
import { inputFile } from './fixtures.js';

function parts(overrides: Partial<PlanParts> = {}): PlanParts {
  const inputs = [
    inputFile(1, { duration: 17.9, hasCoverArt: true }),
    inputFile(2, { duration: 5185.6, bitrate: 0, sampleRate: 0 }),
  ];
  return {
    inputs,
    chapters: buildTimeline(inputs.map((i) => i.duration), ['Intro', 'Main']),
    encoding: { mode: 'cbr', bitrate: '128k', sampleRate: 'inherit', source: 'estimated' },
    metadata: {
      tags: { title: 'Test Book', artist: 'Jane Placeholder' },
      coverArt: { sourcePath: '/books/Test Book (1).mp3', sourceIndex: 1 },
    },
    outputPath: '/books/Test Book.m4b',
    ...overrides,
  };
}

function fakeMuxer(impl: (request: MuxRequest) => Promise<void> = async () => {}) {
  const encodeAndMux = vi.fn(impl);
  const muxer: CombineMuxer = { encodeAndMux };
  return { muxer, encodeAndMux };
}

describe('assemblePlan', () => {
  it('deep-freezes the plan', () => {
    const plan = assemblePlan(parts());

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.chapters[0])).toBe(true);
    expect(Object.isFrozen(plan.metadata.tags)).toBe(true);
    expect(plan.dryRun).toBe(false);
    expect(plan.cleanAfter).toBe(false);
  });

  it('does not share state with its inputs', () => {
    const source = parts();
    const plan = assemblePlan(source);
    expect(plan.chapters).not.toBe(source.chapters);
    expect(plan.chapters).toEqual(source.chapters);
  });

  it('rejects a chapter count that differs from the input count', () => {
    const p = parts();
    expect(() => assemblePlan({ ...p, chapters: p.chapters.slice(0, 1) })).toThrow(LengthMismatchError);
  });

  it('rejects gaps in the timeline', () => {
    const p = parts();
    const [first, second] = p.chapters;
    if (!first || !second) throw new Error('fixture');
    const gapped = [first, { ...second, start: second.start + 1, end: second.end + 1 }];
    expect(() => assemblePlan({ ...p, chapters: gapped })).toThrow(PlanInvariantError);
  });

  it('rejects a timeline that does not end at the summed durations', () => {
    const p = parts();
    const [first, second] = p.chapters;
    if (!first || !second) throw new Error('fixture');
    expect(() => assemblePlan({ ...p, chapters: [first, { ...second, end: second.end + 5 }] })).toThrow(
      PlanInvariantError
    );
  });

  it('rejects an out-of-range VBR quality', () => {
    expect(() =>
      assemblePlan(parts({ encoding: { mode: 'vbr', quality: 9, sampleRate: 'inherit', source: 'explicit' } }))
    ).toThrow(PlanInvariantError);
  });
});

describe('describeEncoding', () => {
  it('describes CBR and VBR settings', () => {
    expect(describeEncoding({ mode: 'cbr', bitrate: '128k', sampleRate: 'inherit', source: 'estimated' })).toBe(
      'CBR 128k (estimated), sample rate inherited from source'
    );
    expect(describeEncoding({ mode: 'vbr', quality: 2, sampleRate: 44100, source: 'explicit' })).toBe(
      'VBR quality 2 (explicit), 44100 Hz'
    );
  });
});

describe('renderPlan', () => {
  it('renders every section of the plan', () => {
    const preview = renderPlan(assemblePlan(parts({ cleanAfter: true })));

    expect(preview.split('\n')).toEqual([
      'Output: /books/Test Book.m4b',
      'Inputs (2):',
      '  1. /books/Test Book (1).mp3 [0:17.90, 128 kbps, 44100 Hz]',
      '  2. /books/Test Book (2).mp3 [1:26:25.60, unknown bitrate, unknown sample rate]',
      'Encoding: CBR 128k (estimated), sample rate inherited from source',
      'Metadata:',
      '  title: Test Book',
      '  artist: Jane Placeholder',
      'Cover art: from /books/Test Book (1).mp3',
      'Chapters (2, total 1:26:43.50):',
      '  1. 0:00.00 - 0:17.90  Intro',
      '  2. 0:17.90 - 1:26:43.50  Main',
      'Part files will be deleted after a successful combine.',
    ]);
  });

  it('marks missing metadata and cover art', () => {
    const preview = renderPlan(assemblePlan(parts({ metadata: { tags: {}, coverArt: null } })));
    expect(preview).toContain('\nMetadata: (none)\n');
    expect(preview).toContain('\nCover art: (none)\n');
  });
});

describe('executePlan', () => {
  it('previews a dry run without calling the muxer or deleting anything', async () => {
    const { muxer, encodeAndMux } = fakeMuxer();
    const removePart = vi.fn(async () => {});

    const plan = assemblePlan(parts({ dryRun: true, cleanAfter: true }));
    const result = await executePlan(plan, { muxer, removePart });

    expect(result).toEqual({ kind: 'preview', preview: renderPlan(plan) });
    expect(encodeAndMux).not.toHaveBeenCalled();
    expect(removePart).not.toHaveBeenCalled();
  });

  it('muxes once with the planned parameters', async () => {
    const { muxer, encodeAndMux } = fakeMuxer();
    const plan = assemblePlan(parts());

    const result = await executePlan(plan, { muxer, removePart: vi.fn(async () => {}) });

    expect(result).toEqual({ kind: 'combined', outputPath: '/books/Test Book.m4b', removed: [], cleanFailures: [] });
    expect(encodeAndMux).toHaveBeenCalledTimes(1);
    expect(encodeAndMux.mock.calls[0]?.[0]).toEqual({
      inputPaths: ['/books/Test Book (1).mp3', '/books/Test Book (2).mp3'],
      encoding: plan.encoding,
      chapters: plan.chapters,
      metadata: plan.metadata,
      outputPath: '/books/Test Book.m4b',
      sourceSampleRate: 44100,
    });
  });

  it('deletes parts only after a successful mux', async () => {
    const order: string[] = [];
    const { muxer } = fakeMuxer(async () => {
      order.push('mux');
    });
    const removePart = vi.fn(async (path: string) => {
      order.push(`rm ${path}`);
    });

    const result = await executePlan(assemblePlan(parts({ cleanAfter: true })), { muxer, removePart });

    expect(order).toEqual(['mux', 'rm /books/Test Book (1).mp3', 'rm /books/Test Book (2).mp3']);
    expect(result).toMatchObject({ removed: ['/books/Test Book (1).mp3', '/books/Test Book (2).mp3'] });
  });

  it('keeps the parts when the mux fails', async () => {
    const { muxer } = fakeMuxer(async () => {
      throw new Error('Invalid data found when processing input');
    });
    const removePart = vi.fn(async () => {});

    const attempt = executePlan(assemblePlan(parts({ cleanAfter: true })), { muxer, removePart });

    await expect(attempt).rejects.toThrow(EncodeError);
    await expect(attempt).rejects.toThrow(
      "Failed to create '/books/Test Book.m4b': Invalid data found when processing input"
    );
    expect(removePart).not.toHaveBeenCalled();
  });

  it('collects deletion failures without failing the run', async () => {
    const { muxer } = fakeMuxer();
    const removePart = vi.fn(async (path: string) => {
      if (path.endsWith('(1).mp3')) throw new Error('EACCES: permission denied');
    });

    const result = await executePlan(assemblePlan(parts({ cleanAfter: true })), { muxer, removePart });

    expect(result).toEqual({
      kind: 'combined',
      outputPath: '/books/Test Book.m4b',
      removed: ['/books/Test Book (2).mp3'],
      cleanFailures: [{ path: '/books/Test Book (1).mp3', reason: 'EACCES: permission denied' }],
    });
  });
});
