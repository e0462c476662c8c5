/**
 * Combine Planner
 *
 * Runs the planning chain for one invocation:
 * probe -> encoding params + metadata -> titles -> timeline -> plan.
 */

import { createLogger } from '@bookbinder/utils';
import { PlanInvariantError } from '../errors/index.js';
import type { CombinePlan, InputProber } from '../types/plan.js';
import { resolveChapterTitles, readTitlesFile } from './chapterTitles.js';
import { mergeMetadata } from './metadataMerger.js';
import { resolveEncodingParams, type EncodingOverrides } from './parameterResolver.js';
import { assemblePlan } from './planAssembler.js';
import { buildTimeline } from './timeline.js';

const log = createLogger({ component: 'planner' });

export interface PlanOptions extends EncodingOverrides {
  outputPath: string;
  chapterThreshold?: number;
  chapterTitlesFile?: string;
  metadataTags?: readonly string[];
  metadataOverrides?: Readonly<Record<string, string>>;
  dryRun?: boolean;
  cleanAfter?: boolean;
}

export class CombinePlanner {
  constructor(private readonly prober: InputProber) {}

  async plan(paths: readonly string[], options: PlanOptions): Promise<CombinePlan> {
    if (paths.length === 0) {
      throw new PlanInvariantError('no input files to combine');
    }

    // Titles need only the part count, so a bad titles file fails before probing
    const titlesText = options.chapterTitlesFile
      ? await readTitlesFile(options.chapterTitlesFile)
      : undefined;
    const titles = resolveChapterTitles(paths.length, {
      threshold: options.chapterThreshold,
      titlesText,
    });

    const inputs = await this.prober.probeAll(paths);
    const first = inputs[0];
    if (!first) {
      throw new PlanInvariantError('prober returned no records');
    }

    const encoding = resolveEncodingParams(first.bitrate, {
      vbr: options.vbr,
      quality: options.quality,
      bitrate: options.bitrate,
      sampleRate: options.sampleRate,
    });

    const metadata = mergeMetadata(inputs, {
      allowList: options.metadataTags,
      overrides: options.metadataOverrides,
    });

    const chapters = buildTimeline(
      inputs.map((input) => input.duration),
      titles
    );

    const plan = assemblePlan({
      inputs,
      chapters,
      encoding,
      metadata,
      outputPath: options.outputPath,
      dryRun: options.dryRun,
      cleanAfter: options.cleanAfter,
    });

    log.info(
      { parts: plan.inputs.length, chapters: plan.chapters.length, outputPath: plan.outputPath },
      'Combine plan assembled'
    );

    return plan;
  }
}
