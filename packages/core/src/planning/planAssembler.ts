/**
 * Plan Assembler
 *
 * Composes the resolved pieces into one frozen CombinePlan, renders it
 * for dry runs, and gates execution: the muxer runs once, and part files
 * are only deleted after it reports success.
 */

import { createLogger, formatTimestamp } from '@bookbinder/utils';
import {
  EncodeError,
  LengthMismatchError,
  PlanInvariantError,
} from '../errors/index.js';
import type {
  ChapterSpec,
  CombineMuxer,
  CombinePlan,
  EncodingParams,
  InputFile,
  MergedMetadata,
} from '../types/plan.js';
import { MAX_VBR_QUALITY, MIN_VBR_QUALITY } from './parameterResolver.js';

const log = createLogger({ component: 'plan-assembler' });

export interface PlanParts {
  inputs: readonly InputFile[];
  chapters: readonly ChapterSpec[];
  encoding: EncodingParams;
  metadata: MergedMetadata;
  outputPath: string;
  dryRun?: boolean;
  cleanAfter?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function assertInvariants(parts: PlanParts): void {
  const { inputs, chapters, encoding } = parts;

  if (chapters.length !== inputs.length) {
    throw new LengthMismatchError('chapters vs inputs', chapters.length, inputs.length, 'plan');
  }
  if (inputs.length === 0) {
    throw new PlanInvariantError('a plan needs at least one input');
  }

  let expectedStart = 0;
  chapters.forEach((chapter, i) => {
    if (chapter.start !== expectedStart) {
      throw new PlanInvariantError(`chapter ${i + 1} starts at ${chapter.start}, expected ${expectedStart}`, { chapter: i + 1 });
    }
    if (!(chapter.end > chapter.start)) {
      throw new PlanInvariantError(`chapter ${i + 1} ends at or before its start`, { chapter: i + 1 });
    }
    expectedStart = chapter.end;
  });

  const sum = inputs.reduce((acc, input) => acc + input.duration, 0);
  if (expectedStart !== sum) {
    throw new PlanInvariantError(`timeline ends at ${expectedStart}, inputs sum to ${sum}`);
  }

  if (
    encoding.mode === 'vbr' &&
    (!Number.isInteger(encoding.quality) || encoding.quality < MIN_VBR_QUALITY || encoding.quality > MAX_VBR_QUALITY)
  ) {
    throw new PlanInvariantError(`VBR quality ${encoding.quality} outside ${MIN_VBR_QUALITY}-${MAX_VBR_QUALITY}`);
  }

  if (parts.outputPath.trim().length === 0) {
    throw new PlanInvariantError('output path is empty');
  }
}

export function assemblePlan(parts: PlanParts): CombinePlan {
  assertInvariants(parts);

  const plan: CombinePlan = {
    inputs: parts.inputs.map((input) => ({ ...input, metadata: { ...input.metadata } })),
    chapters: parts.chapters.map((chapter) => ({ ...chapter })),
    encoding: { ...parts.encoding },
    metadata: {
      tags: { ...parts.metadata.tags },
      coverArt: parts.metadata.coverArt ? { ...parts.metadata.coverArt } : null,
    },
    outputPath: parts.outputPath,
    dryRun: parts.dryRun ?? false,
    cleanAfter: parts.cleanAfter ?? false,
  };

  return deepFreeze(plan);
}

export function describeEncoding(encoding: EncodingParams): string {
  const target = encoding.mode === 'cbr'
    ? `CBR ${encoding.bitrate}`
    : `VBR quality ${encoding.quality}`;
  const sampleRate = encoding.sampleRate === 'inherit'
    ? 'sample rate inherited from source'
    : `${encoding.sampleRate} Hz`;
  return `${target} (${encoding.source}), ${sampleRate}`;
}

/**
 * Human-readable preview of a plan
 */
export function renderPlan(plan: CombinePlan): string {
  const lines: string[] = [];
  const total = plan.chapters.at(-1)?.end ?? 0;

  lines.push(`Output: ${plan.outputPath}`);
  lines.push(`Inputs (${plan.inputs.length}):`);
  for (const input of plan.inputs) {
    const bitrate = input.bitrate > 0 ? `${Math.round(input.bitrate / 1000)} kbps` : 'unknown bitrate';
    const sampleRate = input.sampleRate > 0 ? `${input.sampleRate} Hz` : 'unknown sample rate';
    lines.push(`  ${input.index}. ${input.path} [${formatTimestamp(input.duration)}, ${bitrate}, ${sampleRate}]`);
  }

  lines.push(`Encoding: ${describeEncoding(plan.encoding)}`);

  const tagEntries = Object.entries(plan.metadata.tags);
  if (tagEntries.length === 0) {
    lines.push('Metadata: (none)');
  } else {
    lines.push('Metadata:');
    for (const [key, value] of tagEntries) {
      lines.push(`  ${key}: ${value}`);
    }
  }
  lines.push(
    plan.metadata.coverArt
      ? `Cover art: from ${plan.metadata.coverArt.sourcePath}`
      : 'Cover art: (none)'
  );

  lines.push(`Chapters (${plan.chapters.length}, total ${formatTimestamp(total)}):`);
  for (const chapter of plan.chapters) {
    lines.push(
      `  ${chapter.index}. ${formatTimestamp(chapter.start)} - ${formatTimestamp(chapter.end)}  ${chapter.title}`
    );
  }

  if (plan.cleanAfter) {
    lines.push('Part files will be deleted after a successful combine.');
  }

  return lines.join('\n');
}

export interface ExecuteDependencies {
  muxer: CombineMuxer;
  removePart: (path: string) => Promise<void>;
}

export interface CleanFailure {
  path: string;
  reason: string;
}

export type ExecuteResult =
  | { kind: 'preview'; preview: string }
  | { kind: 'combined'; outputPath: string; removed: string[]; cleanFailures: CleanFailure[] };

/**
 * Delete part files one by one, collecting failures instead of stopping
 */
export async function removeParts(
  paths: readonly string[],
  removePart: (path: string) => Promise<void>
): Promise<{ removed: string[]; failures: CleanFailure[] }> {
  const removed: string[] = [];
  const failures: CleanFailure[] = [];

  for (const path of paths) {
    try {
      await removePart(path);
      removed.push(path);
      log.info({ path }, 'Deleted part file');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      failures.push({ path, reason });
      log.error({ path, reason }, 'Failed to delete part file');
    }
  }

  return { removed, failures };
}

export async function executePlan(
  plan: CombinePlan,
  deps: ExecuteDependencies
): Promise<ExecuteResult> {
  if (plan.dryRun) {
    return { kind: 'preview', preview: renderPlan(plan) };
  }

  log.info(
    { outputPath: plan.outputPath, parts: plan.inputs.length, encoding: describeEncoding(plan.encoding) },
    'Combining parts'
  );

  try {
    await deps.muxer.encodeAndMux({
      inputPaths: plan.inputs.map((input) => input.path),
      encoding: plan.encoding,
      chapters: plan.chapters,
      metadata: plan.metadata,
      outputPath: plan.outputPath,
      sourceSampleRate: plan.inputs[0]?.sampleRate ?? 0,
    });
  } catch (error) {
    if (error instanceof EncodeError) {
      throw error;
    }
    const diagnostic = error instanceof Error ? error.message : String(error);
    throw new EncodeError(plan.outputPath, diagnostic);
  }

  if (!plan.cleanAfter) {
    return { kind: 'combined', outputPath: plan.outputPath, removed: [], cleanFailures: [] };
  }

  const { removed, failures } = await removeParts(
    plan.inputs.map((input) => input.path),
    deps.removePart
  );
  return { kind: 'combined', outputPath: plan.outputPath, removed, cleanFailures: failures };
}
