/**
 * Rechapter Command
 *
 * Replace the chapters of an audiobook from a "Title HH:MM:SS.ss" list.
 */

import ora from 'ora';
import { chapterListToTimeline, InvalidParameterError, mergeMetadata } from '@bookbinder/core';
import { FFProbe, readContainerChapters, type ProbeRunner } from '@bookbinder/media';
import { ChapterEditor, FFmpeg } from '@bookbinder/processing';
import { safeReadFile } from '@bookbinder/utils';
import type { CliConfig } from '../config/index.js';
import { formatFailure, printError, printSuccess } from '../lib/output.js';

export interface RechapterOptions {
  input: string;
  chapters: string;
  output: string;
}

export interface RechapterDependencies {
  probe: ProbeRunner;
  editor: ChapterEditor;
  tempDir?: string;
}

export async function runRechapter(
  options: RechapterOptions,
  deps: RechapterDependencies
): Promise<number> {
  const spinner = ora('Reading chapter list...').start();

  try {
    const listText = await safeReadFile(options.chapters);
    if (listText === null) {
      throw new InvalidParameterError('chapter list file', options.chapters, 'a readable file', 'chapters');
    }
    const chapters = chapterListToTimeline(listText);

    // Carry the book's recognized tags over to the rewritten file
    const container = await readContainerChapters(options.input, deps.probe);
    const { tags } = mergeMetadata([
      { index: 1, path: options.input, metadata: container.tags, hasCoverArt: false },
    ]);

    spinner.text = `Writing ${chapters.length} chapters to ${options.output}...`;
    await deps.editor.applyChapters({
      inputPath: options.input,
      outputPath: options.output,
      chapters,
      tags,
      tempDir: deps.tempDir,
    });
    spinner.stop();

    printSuccess(`Wrote ${options.output} with ${chapters.length} chapters`);
    return 0;
  } catch (error) {
    spinner.fail();
    printError(formatFailure(error));
    return 1;
  }
}

export async function rechapterCommand(options: RechapterOptions, config: CliConfig): Promise<void> {
  const timeout = config.commandTimeoutMs;
  process.exitCode = await runRechapter(options, {
    probe: new FFProbe(config.mediaTools.ffprobe, { timeout }),
    editor: new ChapterEditor(new FFmpeg(config.mediaTools.ffmpeg, { timeout })),
    tempDir: config.tempDir,
  });
}
