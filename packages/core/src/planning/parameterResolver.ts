/**
 * Parameter Resolver
 *
 * Picks the output bitrate (CBR) or quality level (VBR) and sample rate.
 * Estimation looks only at the first part's bitrate, even when parts differ.
 */

import { createLogger, isPositiveInteger } from '@bookbinder/utils';
import { InvalidParameterError } from '../errors/index.js';
import type { EncodingParams, SampleRate } from '../types/plan.js';

const log = createLogger({ component: 'parameter-resolver' });

export interface BitrateTier {
  minBitrate: number;   // bits/sec, inclusive
  cbr: string;
  vbrQuality: number;
}

const LOWEST_TIER: BitrateTier = { minBitrate: 0, cbr: '48k', vbrQuality: 5 };

/**
 * Descending thresholds; the first tier the source reaches wins.
 * The last tier catches everything else, including unknown (0).
 */
export const BITRATE_TIERS: readonly BitrateTier[] = [
  { minBitrate: 256000, cbr: '256k', vbrQuality: 0 },
  { minBitrate: 192000, cbr: '192k', vbrQuality: 1 },
  { minBitrate: 128000, cbr: '128k', vbrQuality: 2 },
  { minBitrate: 96000, cbr: '96k', vbrQuality: 3 },
  { minBitrate: 64000, cbr: '64k', vbrQuality: 4 },
  LOWEST_TIER,
];

export const MIN_VBR_QUALITY = 0;
export const MAX_VBR_QUALITY = 5;

const BITRATE_PATTERN = /^\d+(\.\d+)?[kKM]?$/;

export interface EncodingOverrides {
  vbr?: boolean;
  quality?: number;
  bitrate?: string;
  sampleRate?: number;
}

export function tierFor(sourceBitrate: number): BitrateTier {
  const bitrate = Number.isFinite(sourceBitrate) ? sourceBitrate : 0;
  return BITRATE_TIERS.find((t) => bitrate >= t.minBitrate) ?? LOWEST_TIER;
}

export function estimateCbrBitrate(sourceBitrate: number): string {
  return tierFor(sourceBitrate).cbr;
}

export function estimateVbrQuality(sourceBitrate: number): number {
  return tierFor(sourceBitrate).vbrQuality;
}

function validateQuality(quality: number): number {
  if (!Number.isInteger(quality) || quality < MIN_VBR_QUALITY || quality > MAX_VBR_QUALITY) {
    throw new InvalidParameterError(
      'quality',
      quality,
      `an integer from ${MIN_VBR_QUALITY} to ${MAX_VBR_QUALITY}`
    );
  }
  return quality;
}

function validateBitrate(bitrate: string): string {
  const trimmed = bitrate.trim();
  if (!BITRATE_PATTERN.test(trimmed)) {
    throw new InvalidParameterError('bitrate', bitrate, 'a number optionally suffixed with k or M, e.g. 64k');
  }
  return trimmed;
}

function resolveSampleRate(sampleRate: number | undefined): SampleRate {
  if (sampleRate === undefined) {
    return 'inherit';
  }
  if (!isPositiveInteger(sampleRate)) {
    throw new InvalidParameterError('sample rate', sampleRate, 'a positive integer in Hz, e.g. 44100');
  }
  return sampleRate;
}

/**
 * Resolve output encoding parameters from the first part's bitrate and
 * any explicit overrides.
 */
export function resolveEncodingParams(
  sourceBitrate: number,
  overrides: EncodingOverrides = {}
): EncodingParams {
  // Range-check quality even when it ends up unused
  const quality = overrides.quality === undefined ? undefined : validateQuality(overrides.quality);
  const bitrate = overrides.bitrate === undefined ? undefined : validateBitrate(overrides.bitrate);
  const sampleRate = resolveSampleRate(overrides.sampleRate);

  if (overrides.vbr) {
    if (bitrate !== undefined) {
      log.warn({ bitrate }, 'Bitrate is ignored in VBR mode');
    }
    if (quality !== undefined) {
      log.info({ quality }, 'Using user-specified VBR quality level');
      return { mode: 'vbr', quality, sampleRate, source: 'explicit' };
    }
    const estimated = estimateVbrQuality(sourceBitrate);
    log.info({ quality: estimated, sourceBitrate }, 'Estimated VBR quality level from first part');
    return { mode: 'vbr', quality: estimated, sampleRate, source: 'estimated' };
  }

  if (quality !== undefined) {
    log.warn({ quality }, 'Quality is ignored in CBR mode; pass --vbr to use it');
  }
  if (bitrate !== undefined) {
    log.info({ bitrate }, 'Using user-specified CBR bitrate');
    return { mode: 'cbr', bitrate, sampleRate, source: 'explicit' };
  }
  const estimated = estimateCbrBitrate(sourceBitrate);
  log.info({ bitrate: estimated, sourceBitrate }, 'Estimated CBR bitrate from first part');
  return { mode: 'cbr', bitrate: estimated, sampleRate, source: 'estimated' };
}
