/**
 * Combine Command
 *
 * Default action: combine the parts found in a directory into one .m4b,
 * and/or delete the parts once the combined book exists.
 */

import { unlink } from 'node:fs/promises';
import { resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import {
  CombinePlanner,
  executePlan,
  removeParts,
  type CombineMuxer,
  type InputProber,
} from '@bookbinder/core';
import { FFProbe, ProbeAdapter } from '@bookbinder/media';
import { AudiobookMuxer, FFmpeg } from '@bookbinder/processing';
import { fileExists, formatDuration, getFileSizeBytes } from '@bookbinder/utils';
import type { CliConfig } from '../config/index.js';
import { discoverBook, type DiscoveredBook } from '../lib/discovery.js';
import {
  formatBytes,
  formatFailure,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface CombineOptions {
  combine?: boolean;
  clean?: boolean;
  dryRun?: boolean;
  vbr?: boolean;
  quality?: number;
  bitrate?: string;
  sampleRate?: number;
  chapterThreshold?: number;
  chapterTitlesFile?: string;
  dir?: string;
  output?: string;
  tag?: Record<string, string>;
}

export interface CombineDependencies {
  prober: InputProber;
  muxer: CombineMuxer;
  removePart: (path: string) => Promise<void>;
  chapterThreshold: number;
}

export function createCombineDependencies(config: CliConfig): CombineDependencies {
  const timeout = config.commandTimeoutMs;
  return {
    prober: new ProbeAdapter(new FFProbe(config.mediaTools.ffprobe, { timeout })),
    muxer: new AudiobookMuxer(new FFmpeg(config.mediaTools.ffmpeg, { timeout }), {
      tempDir: config.tempDir,
    }),
    removePart: (path) => unlink(path),
    chapterThreshold: config.chapterThreshold,
  };
}

async function totalSize(paths: readonly string[]): Promise<number> {
  let bytes = 0;
  for (const path of paths) {
    bytes += await getFileSizeBytes(path);
  }
  return bytes;
}

async function reportSizes(inputBytes: number, outputPath: string): Promise<void> {
  const outputBytes = await getFileSizeBytes(outputPath);

  printKeyValue('Input size', formatBytes(inputBytes));
  printKeyValue('Output size', formatBytes(outputBytes));
  if (outputBytes > 0) {
    printKeyValue('Size ratio (input/output)', (inputBytes / outputBytes).toFixed(2));
  } else {
    printWarning('Output file size is zero. Cannot compute size ratio.');
  }
}

async function cleanOnly(
  book: DiscoveredBook,
  outputPath: string,
  options: CombineOptions,
  deps: CombineDependencies
): Promise<number> {
  if (!(await fileExists(outputPath))) {
    printWarning(`Cannot clean: '${outputPath}' does not exist.`);
    return 0;
  }

  if (options.dryRun) {
    printHeader(`Would delete ${book.parts.length} part files of '${book.bookName}'`);
    for (const part of book.parts) {
      console.log(`  ${part}`);
    }
    return 0;
  }

  const { removed, failures } = await removeParts(book.parts, deps.removePart);
  printSuccess(`Deleted ${removed.length} part files`);
  for (const failure of failures) {
    printWarning(`Could not delete '${failure.path}': ${failure.reason}`);
  }
  return 0;
}

/**
 * Run the combine/clean flow; resolves to the process exit code
 */
export async function runCombine(
  options: CombineOptions,
  deps: CombineDependencies
): Promise<number> {
  if (!options.combine && !options.clean) {
    printInfo(`Nothing to do. Pass ${chalk.cyan('--combine')} and/or ${chalk.cyan('--clean')}.`);
    return 0;
  }

  const spinner = ora();

  try {
    const directory = resolve(options.dir ?? process.cwd());
    const book = await discoverBook(directory);
    const outputPath = options.output ? resolve(options.output) : book.outputPath;
    printInfo(`Book: ${chalk.bold(book.bookName)} (${book.parts.length} parts)`);

    if (!options.combine) {
      return await cleanOnly(book, outputPath, options, deps);
    }

    spinner.start(`Probing ${book.parts.length} part files...`);
    const planner = new CombinePlanner(deps.prober);
    const plan = await planner.plan(book.parts, {
      outputPath,
      vbr: options.vbr,
      quality: options.quality,
      bitrate: options.bitrate,
      sampleRate: options.sampleRate,
      chapterThreshold: options.chapterThreshold ?? deps.chapterThreshold,
      chapterTitlesFile: options.chapterTitlesFile,
      metadataOverrides: options.tag,
      dryRun: options.dryRun,
      cleanAfter: options.clean,
    });
    spinner.stop();

    // Measured up front: cleaning removes the parts
    const inputBytes = plan.dryRun ? 0 : await totalSize(book.parts);
    const started = Date.now();
    if (!plan.dryRun) {
      spinner.start(`Encoding ${plan.inputs.length} parts into ${outputPath}...`);
    }
    const result = await executePlan(plan, { muxer: deps.muxer, removePart: deps.removePart });

    if (result.kind === 'preview') {
      printHeader('Dry run');
      console.log(result.preview);
      return 0;
    }

    spinner.succeed(`Created ${result.outputPath} in ${formatDuration(Date.now() - started)}`);
    await reportSizes(inputBytes, result.outputPath);
    if (plan.cleanAfter) {
      printSuccess(`Deleted ${result.removed.length} part files`);
      for (const failure of result.cleanFailures) {
        printWarning(`Could not delete '${failure.path}': ${failure.reason}`);
      }
    }
    return 0;
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail();
    }
    printError(formatFailure(error));
    return 1;
  }
}

export async function combineCommand(options: CombineOptions, config: CliConfig): Promise<void> {
  process.exitCode = await runCombine(options, createCombineDependencies(config));
}
