/**
 * Chapter Editor
 *
 * Edits the chapters of an existing audiobook with stream copy:
 * replace its chapter table, or split it into one file per chapter.
 */

import { writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  EncodeError,
  InvalidParameterError,
  type ChapterSpec,
} from '@bookbinder/core';
import { filterShortChapters, type ChapterInfo } from '@bookbinder/media';
import {
  createLogger,
  ensureDir,
  moveFile,
  sanitizeFilename,
  withTempDir,
} from '@bookbinder/utils';
import {
  createChapterApplyCommand,
  createSegmentCommand,
  type FFmpegCommandBuilder,
} from './commandBuilder.js';
import { describeFailure, FFmpeg, type FFmpegResult, type FFmpegRunner } from './ffmpeg.js';
import { toFFMetadata } from './packaging/ffmetadata.js';

const log = createLogger({ component: 'chapter-editor' });

export interface ApplyChaptersOptions {
  inputPath: string;
  outputPath: string;
  chapters: readonly ChapterSpec[];
  /** Global tags to carry over; the metadata file replaces the input's */
  tags?: Readonly<Record<string, string>>;
  tempDir?: string;
}

export interface SplitChaptersOptions {
  inputPath: string;
  outputDir: string;
  bookTitle: string;
  chapters: readonly ChapterInfo[];
}

export class ChapterEditor {
  private ffmpeg: FFmpegRunner;

  constructor(ffmpeg: FFmpegRunner = new FFmpeg()) {
    this.ffmpeg = ffmpeg;
  }

  /**
   * Write a copy of the input with a new chapter table
   */
  async applyChapters(options: ApplyChaptersOptions): Promise<void> {
    const { inputPath, outputPath, chapters } = options;

    if (resolve(inputPath) === resolve(outputPath)) {
      throw new InvalidParameterError('output path', outputPath, 'a path other than the input', 'chapters');
    }
    if (chapters.length === 0) {
      throw new InvalidParameterError('chapter list', '', 'at least one chapter', 'chapters');
    }

    await withTempDir('bookbinder-chapters-', async (dir) => {
      const metadataFile = join(dir, 'metadata.txt');
      await writeFile(metadataFile, toFFMetadata(options.tags ?? {}, chapters), 'utf-8');

      const staged = join(dir, 'output.m4b');
      await this.run(createChapterApplyCommand(inputPath, metadataFile, staged), outputPath);
      await moveFile(staged, outputPath);
    }, options.tempDir);

    log.info({ inputPath, outputPath, chapters: chapters.length }, 'Applied chapters');
  }

  /**
   * Write each chapter as "<book title> (<n>).m4b". Returns the files
   * written, or nothing when fewer than two chapters are long enough.
   */
  async splitChapters(options: SplitChaptersOptions): Promise<string[]> {
    const chapters = filterShortChapters(options.chapters);
    if (chapters.length < 2) {
      log.info({ inputPath: options.inputPath, chapters: chapters.length }, 'Nothing to split');
      return [];
    }

    await ensureDir(options.outputDir);
    const bookTitle = sanitizeFilename(options.bookTitle) || 'Untitled';
    const seen = new Set<string>();
    const written: string[] = [];

    for (const chapter of chapters) {
      const key = `${chapter.title}|${chapter.startTime}|${chapter.endTime}`;
      if (seen.has(key)) {
        log.warn({ title: chapter.title, start: chapter.startTime }, 'Skipping duplicate chapter');
        continue;
      }
      seen.add(key);

      const outputPath = join(options.outputDir, `${bookTitle} (${written.length + 1}).m4b`);
      await this.run(
        createSegmentCommand(
          options.inputPath,
          outputPath,
          chapter.startTime,
          chapter.endTime - chapter.startTime,
          chapter.title
        ),
        outputPath
      );
      written.push(outputPath);
      log.info({ title: chapter.title, outputPath }, 'Wrote chapter');
    }

    return written;
  }

  private async run(command: FFmpegCommandBuilder, outputPath: string): Promise<void> {
    let result: FFmpegResult;
    try {
      result = await this.ffmpeg.execute(command.build());
    } catch (error) {
      // ffmpeg could not be started at all (missing binary, bad path)
      throw new EncodeError(outputPath, error instanceof Error ? error.message : String(error));
    }
    if (result.exitCode !== 0) {
      throw new EncodeError(outputPath, describeFailure(result));
    }
  }
}
