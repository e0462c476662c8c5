/**
 * Audiobook Muxer
 *
 * Turns a MuxRequest into one chaptered .m4b: extract the cover, encode
 * each part to AAC, then concatenate with tags, chapters and cover in a
 * single stream-copy pass.
 *
 * All intermediate files live in a scoped temporary directory; the output
 * path is only written once the final mux succeeded.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { EncodeError, type CombineMuxer, type MuxRequest } from '@bookbinder/core';
import { createLogger, moveFile, withTempDir } from '@bookbinder/utils';
import {
  createConcatMuxCommand,
  createCoverExtractCommand,
  createPartEncodeCommand,
  toAudioCodecOptions,
  type FFmpegCommandBuilder,
} from './commandBuilder.js';
import { describeFailure, FFmpeg, type FFmpegRunner } from './ffmpeg.js';
import { toConcatList, toFFMetadata } from './packaging/ffmetadata.js';

const log = createLogger({ component: 'muxer' });

export interface AudiobookMuxerOptions {
  /** Parent directory for the scoped temp dir (OS default when omitted) */
  tempDir?: string;
}

export class AudiobookMuxer implements CombineMuxer {
  private ffmpeg: FFmpegRunner;
  private tempDir: string | undefined;

  constructor(ffmpeg: FFmpegRunner = new FFmpeg(), options: AudiobookMuxerOptions = {}) {
    this.ffmpeg = ffmpeg;
    this.tempDir = options.tempDir;
  }

  async encodeAndMux(request: MuxRequest): Promise<void> {
    await withTempDir('bookbinder-', (dir) => this.runInDir(dir, request), this.tempDir);
  }

  private async runInDir(dir: string, request: MuxRequest): Promise<void> {
    const { outputPath } = request;

    let coverFile: string | undefined;
    const cover = request.metadata.coverArt;
    if (cover) {
      coverFile = join(dir, 'cover.jpg');
      await this.run(createCoverExtractCommand(cover.sourcePath, coverFile), outputPath);
      log.info({ source: cover.sourcePath }, 'Extracted cover art');
    }

    const audio = toAudioCodecOptions(request.encoding, request.sourceSampleRate);
    const encodedParts: string[] = [];
    for (const [i, inputPath] of request.inputPaths.entries()) {
      const partFile = join(dir, `part-${String(i + 1).padStart(4, '0')}.m4a`);
      await this.run(createPartEncodeCommand(inputPath, partFile, audio), outputPath);
      encodedParts.push(partFile);
      log.info({ part: i + 1, of: request.inputPaths.length, input: inputPath }, 'Encoded part');
    }

    const concatListFile = join(dir, 'concat.txt');
    const metadataFile = join(dir, 'metadata.txt');
    await writeFile(concatListFile, toConcatList(encodedParts), 'utf-8');
    await writeFile(metadataFile, toFFMetadata(request.metadata.tags, request.chapters), 'utf-8');

    const stagedOutput = join(dir, 'output.m4b');
    await this.run(
      createConcatMuxCommand({ concatListFile, metadataFile, coverFile, outputFile: stagedOutput }),
      outputPath
    );

    await moveFile(stagedOutput, outputPath);
    log.info({ outputPath, chapters: request.chapters.length }, 'Wrote audiobook');
  }

  private async run(command: FFmpegCommandBuilder, outputPath: string): Promise<void> {
    const args = command.build();
    log.debug({ command: command.buildString() }, 'ffmpeg step');

    const result = await this.ffmpeg.execute(args);
    if (result.exitCode !== 0) {
      const diagnostic = describeFailure(result);
      log.error({ outputPath, exitCode: result.exitCode, stderr: diagnostic }, 'ffmpeg failed');
      throw new EncodeError(outputPath, diagnostic);
    }
  }
}
