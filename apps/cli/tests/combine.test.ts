import { mkdtemp, readdir, rm, unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ProbeError,
  type CombineMuxer,
  type InputFile,
  type InputProber,
  type MuxRequest,
} from '@bookbinder/core';
import { runCombine, type CombineDependencies } from '../src/commands/combine.js';

function probedFile(index: number, path: string): InputFile {
  return {
    index,
    path,
    duration: 600,
    bitrate: 128000,
    sampleRate: 44100,
    metadata: { title: 'Test Book' },
    hasCoverArt: false,
  };
}

describe('runCombine', () => {
  let dir: string;
  let requests: MuxRequest[];
  let deps: CombineDependencies;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bookbinder-combine-'));
    for (const n of [1, 2, 10]) {
      await writeFile(join(dir, `Test Book (${n}).mp3`), 'audio');
    }

    requests = [];
    const prober: InputProber = {
      probeAll: vi.fn(async (paths: readonly string[]) => paths.map((p, i) => probedFile(i + 1, p))),
    };
    const muxer: CombineMuxer = {
      encodeAndMux: vi.fn(async (request: MuxRequest) => {
        requests.push(request);
        await writeFile(request.outputPath, 'book');
      }),
    };
    deps = { prober, muxer, removePart: vi.fn((path: string) => unlink(path)), chapterThreshold: 6 };

    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('does nothing without --combine or --clean', async () => {
    expect(await runCombine({ dir }, deps)).toBe(0);
    expect(deps.prober.probeAll).not.toHaveBeenCalled();
  });

  it('previews a dry run without encoding or deleting', async () => {
    const code = await runCombine({ dir, combine: true, clean: true, dryRun: true }, deps);

    expect(code).toBe(0);
    expect(requests).toEqual([]);
    expect(deps.removePart).not.toHaveBeenCalled();
    expect(await readdir(dir)).toHaveLength(3);
  });

  it('combines parts in number order and removes them afterwards', async () => {
    const code = await runCombine({ dir, combine: true, clean: true }, deps);

    expect(code).toBe(0);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.inputPaths).toEqual([
      join(dir, 'Test Book (1).mp3'),
      join(dir, 'Test Book (2).mp3'),
      join(dir, 'Test Book (10).mp3'),
    ]);
    expect(requests[0]?.outputPath).toBe(join(dir, 'Test Book.m4b'));
    expect(requests[0]?.chapters.map((c) => c.title)).toEqual(['Part 1', 'Part 2', 'Part 3']);
    expect(await readdir(dir)).toEqual(['Test Book.m4b']);
  });

  it('passes --tag overrides into the metadata', async () => {
    await runCombine({ dir, combine: true, tag: { title: 'Override' } }, deps);

    expect(requests[0]?.metadata.tags['title']).toBe('Override');
  });

  it('leaves the parts alone when cleaning without a combined book', async () => {
    const code = await runCombine({ dir, clean: true }, deps);

    expect(code).toBe(0);
    expect(deps.removePart).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('returns 1 and names the stage when probing fails', async () => {
    deps.prober.probeAll = vi.fn(async () => {
      throw new ProbeError('/books/x.mp3', 'no audio stream');
    });

    const code = await runCombine({ dir, combine: true }, deps);

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.anything(),
      "probe failed: Cannot probe '/books/x.mp3': no audio stream"
    );
  });
});
