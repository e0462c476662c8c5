/**
 * Probe Adapter tests
 */

import { describe, expect, it, vi } from 'vitest';
import { ProbeError } from '@bookbinder/core';
import { ProbeAdapter, toInputFile } from '../src/probeAdapter.js';
import { parseProbeOutput, type FFProbeResult, type ProbeRunner } from '../src/probes/ffprobe.js';

function probeResult(overrides: Partial<FFProbeResult> = {}): FFProbeResult {
  return {
    format: { duration: '600.250000', bit_rate: '130000', tags: { Title: 'Test Book', ARTIST: 'Jane Placeholder' } },
    streams: [
      { index: 0, codec_type: 'audio', codec_name: 'mp3', sample_rate: '44100', bit_rate: '128000' },
    ],
    chapters: [],
    ...overrides,
  };
}

function fakeRunner(results: Record<string, FFProbeResult | Error>) {
  const probe = vi.fn(async (filePath: string) => {
    const result = results[filePath];
    if (result === undefined) throw new Error(`unexpected path ${filePath}`);
    if (result instanceof Error) throw result;
    return result;
  });
  const runner: ProbeRunner = { probe };
  return { runner, probe };
}

describe('toInputFile', () => {
  it('normalizes format and stream fields', () => {
    expect(toInputFile(probeResult(), '/books/A (1).mp3', 1)).toEqual({
      index: 1,
      path: '/books/A (1).mp3',
      duration: 600.25,
      bitrate: 130000,
      sampleRate: 44100,
      metadata: { title: 'Test Book', artist: 'Jane Placeholder' },
      hasCoverArt: false,
    });
  });

  it('falls back to stream values', () => {
    const input = toInputFile(
      probeResult({
        format: {},
        streams: [{ index: 0, codec_type: 'audio', duration: '12.5', bit_rate: '64000' }],
      }),
      'a.mp3',
      1
    );
    expect(input).toMatchObject({ duration: 12.5, bitrate: 64000, sampleRate: 0 });
  });

  it('reports unknown bitrate as 0', () => {
    const input = toInputFile(
      probeResult({ format: { duration: '10' }, streams: [{ index: 0, codec_type: 'audio' }] }),
      'a.mp3',
      1
    );
    expect(input.bitrate).toBe(0);
  });

  it('detects an attached picture', () => {
    const input = toInputFile(
      probeResult({
        streams: [
          { index: 0, codec_type: 'audio' },
          { index: 1, codec_type: 'video', codec_name: 'mjpeg', disposition: { default: 0, attached_pic: 1 } },
        ],
      }),
      'a.m4a',
      1
    );
    expect(input.hasCoverArt).toBe(true);
  });

  it('fails on missing or non-positive duration', () => {
    const noDuration = probeResult({ format: {}, streams: [{ index: 0, codec_type: 'audio' }] });
    expect(() => toInputFile(noDuration, 'broken.mp3', 1)).toThrow(ProbeError);
    expect(() => toInputFile(noDuration, 'broken.mp3', 1)).toThrow("Cannot probe 'broken.mp3'");

    expect(() => toInputFile(probeResult({ format: { duration: '0' } }), 'zero.mp3', 1)).toThrow(ProbeError);
  });

  it('fails without an audio stream', () => {
    expect(() => toInputFile(probeResult({ streams: [] }), 'silent.mp4', 1)).toThrow('no audio stream found');
  });
});

describe('ProbeAdapter', () => {
  it('probes each file once, in order', async () => {
    const { runner, probe } = fakeRunner({
      'b.mp3': probeResult({ format: { duration: '2' } }),
      'a.mp3': probeResult({ format: { duration: '1' } }),
    });

    const inputs = await new ProbeAdapter(runner).probeAll(['b.mp3', 'a.mp3']);

    expect(inputs.map((i) => [i.index, i.path, i.duration])).toEqual([
      [1, 'b.mp3', 2],
      [2, 'a.mp3', 1],
    ]);
    expect(probe.mock.calls.map((call) => call[0])).toEqual(['b.mp3', 'a.mp3']);
  });

  it('wraps runner failures in a ProbeError naming the file', async () => {
    const { runner } = fakeRunner({ 'bad.mp3': new Error('ffprobe failed with exit code 1: Invalid data') });

    await expect(new ProbeAdapter(runner).probeAll(['bad.mp3'])).rejects.toThrow(
      "Cannot probe 'bad.mp3': ffprobe failed with exit code 1: Invalid data"
    );
  });
});

describe('parseProbeOutput', () => {
  it('defaults missing stream and chapter lists', () => {
    expect(parseProbeOutput('{"format":{"duration":"5.0"}}')).toEqual({
      format: { duration: '5.0' },
      streams: [],
      chapters: [],
    });
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseProbeOutput('not json')).toThrow('Failed to parse ffprobe output: not json');
  });
});
