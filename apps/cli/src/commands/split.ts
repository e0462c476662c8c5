/**
 * Split Command
 *
 * Write each chapter of an audiobook as its own file.
 */

import ora from 'ora';
import { FFProbe, readContainerChapters, type ProbeRunner } from '@bookbinder/media';
import { ChapterEditor, FFmpeg } from '@bookbinder/processing';
import type { CliConfig } from '../config/index.js';
import { formatFailure, printError, printInfo, printSuccess } from '../lib/output.js';

export interface SplitOptions {
  input: string;
  output: string;
}

export interface SplitDependencies {
  probe: ProbeRunner;
  editor: ChapterEditor;
}

export async function runSplit(options: SplitOptions, deps: SplitDependencies): Promise<number> {
  const spinner = ora('Reading chapters...').start();

  try {
    const container = await readContainerChapters(options.input, deps.probe);

    spinner.text = `Splitting ${container.bookTitle}...`;
    const written = await deps.editor.splitChapters({
      inputPath: options.input,
      outputDir: options.output,
      bookTitle: container.bookTitle,
      chapters: container.chapters,
    });
    spinner.stop();

    if (written.length === 0) {
      printInfo('Fewer than two chapters; nothing to split');
      return 0;
    }
    printSuccess(`Wrote ${written.length} chapter files to ${options.output}`);
    for (const path of written) {
      console.log(`  ${path}`);
    }
    return 0;
  } catch (error) {
    spinner.fail();
    printError(formatFailure(error));
    return 1;
  }
}

export async function splitCommand(options: SplitOptions, config: CliConfig): Promise<void> {
  const timeout = config.commandTimeoutMs;
  process.exitCode = await runSplit(options, {
    probe: new FFProbe(config.mediaTools.ffprobe, { timeout }),
    editor: new ChapterEditor(new FFmpeg(config.mediaTools.ffmpeg, { timeout })),
  });
}
