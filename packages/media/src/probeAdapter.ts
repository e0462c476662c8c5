/**
 * Probe Adapter
 *
 * Probes each part once, in order, and normalizes ffprobe's output into
 * InputFile records. Unknown bitrate or sample rate becomes 0; a missing
 * or non-positive duration is fatal.
 */

import { ProbeError, type InputFile, type InputProber } from '@bookbinder/core';
import { createLogger } from '@bookbinder/utils';
import { FFProbe, type FFProbeResult, type FFProbeStream, type ProbeRunner } from './probes/ffprobe.js';

const log = createLogger({ component: 'probe-adapter' });

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function firstAudioStream(result: FFProbeResult): FFProbeStream | undefined {
  return result.streams.find((s) => s.codec_type === 'audio');
}

/**
 * Lower-case tag keys; when two keys collide the first spelling wins
 */
export function normalizeTags(tags: Readonly<Record<string, string>> | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags ?? {})) {
    const lower = key.toLowerCase();
    if (!(lower in normalized)) {
      normalized[lower] = value;
    }
  }
  return normalized;
}

export function hasAttachedPicture(result: FFProbeResult): boolean {
  return result.streams.some(
    (s) => s.codec_type === 'video' && s.disposition?.['attached_pic'] === 1
  );
}

/**
 * Convert one ffprobe result into an InputFile
 */
export function toInputFile(result: FFProbeResult, filePath: string, index: number): InputFile {
  const audio = firstAudioStream(result);
  if (!audio) {
    throw new ProbeError(filePath, 'no audio stream found');
  }

  const duration = parseNumber(result.format?.duration) ?? parseNumber(audio.duration);
  if (duration === undefined) {
    throw new ProbeError(filePath, 'duration could not be determined');
  }
  if (duration <= 0) {
    throw new ProbeError(filePath, `non-positive duration ${duration}`);
  }

  const bitrate = parseNumber(result.format?.bit_rate) ?? parseNumber(audio.bit_rate) ?? 0;
  const sampleRate = parseNumber(audio.sample_rate) ?? 0;

  return {
    index,
    path: filePath,
    duration,
    bitrate: Math.max(0, Math.round(bitrate)),
    sampleRate: Math.max(0, Math.round(sampleRate)),
    metadata: normalizeTags(result.format?.tags),
    hasCoverArt: hasAttachedPicture(result),
  };
}

export class ProbeAdapter implements InputProber {
  private runner: ProbeRunner;

  constructor(runner: ProbeRunner = new FFProbe()) {
    this.runner = runner;
  }

  async probeOne(filePath: string, index: number): Promise<InputFile> {
    let result: FFProbeResult;
    try {
      result = await this.runner.probe(filePath);
    } catch (error) {
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
    }

    const input = toInputFile(result, filePath, index);
    log.debug(
      { filePath, duration: input.duration, bitrate: input.bitrate, sampleRate: input.sampleRate },
      'Probed part'
    );
    if (input.bitrate === 0) {
      log.warn({ filePath }, 'Could not determine bitrate');
    }
    return input;
  }

  /**
   * Probe every path sequentially, preserving order
   */
  async probeAll(paths: readonly string[]): Promise<InputFile[]> {
    const inputs: InputFile[] = [];
    for (const [i, filePath] of paths.entries()) {
      inputs.push(await this.probeOne(filePath, i + 1));
    }
    log.info({ parts: inputs.length }, 'Probed all parts');
    return inputs;
  }
}
