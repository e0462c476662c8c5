/**
 * FFmpeg Command Builder
 *
 * Fluent API for building the audio encode, concat and mux commands an
 * audiobook needs.
 *
 * Audio is only re-encoded for parts; the final mux is always stream copy.
 */

import type { EncodingParams } from '@bookbinder/core';
import { formatCommand } from '@bookbinder/utils';

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
  duration?: number;      // -t duration
  format?: string;        // -f format
  extraArgs?: string[];   // Additional input args
}

export interface OutputOptions {
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];   // Additional output args
}

interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'a', 'v:0'
  optional?: boolean;     // Add ? for optional
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;       // -b:a, constant bitrate
  quality?: number;       // -q:a, variable bitrate
  sampleRate?: number;
}

interface MetadataEntry {
  key: string;
  value: string;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private audioCodec: AudioCodecOptions | null = null;
  private videoCodec: 'copy' | null = null;
  private streamCopy = false;
  private noVideo = false;
  private metadata: MetadataEntry[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private mapChapters: number | null = null;
  private mapMetadata: number | null = null;
  private dispositions: { stream: string; disposition: string }[] = [];

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add input with seeking
   */
  addInputWithSeek(file: string, seekSeconds: number, duration?: number): this {
    return this.addInput(file, { seekTo: seekSeconds, duration });
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  mapAudio(inputIndex: number = 0, streamIndex?: number, optional: boolean = false): this {
    const spec = streamIndex !== undefined ? `a:${streamIndex}` : 'a';
    return this.map(inputIndex, spec, optional);
  }

  mapVideo(inputIndex: number = 0, streamIndex?: number, optional: boolean = true): this {
    const spec = streamIndex !== undefined ? `v:${streamIndex}` : 'v';
    return this.map(inputIndex, spec, optional);
  }

  /**
   * Drop video streams (embedded pictures) from the output
   */
  disableVideo(): this {
    this.noVideo = true;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setVideoCodec(codec: 'copy'): this {
    this.videoCodec = codec;
    return this;
  }

  /**
   * Copy every mapped stream (-c copy)
   */
  copyAllStreams(): this {
    this.streamCopy = true;
    return this;
  }

  /**
   * Copy chapters from input
   */
  copyChapters(inputIndex: number = 0): this {
    this.mapChapters = inputIndex;
    return this;
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  addMetadata(key: string, value: string): this {
    this.metadata.push({ key, value });
    return this;
  }

  setDisposition(stream: string, disposition: string): this {
    this.dispositions.push({ stream, disposition });
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', input.options.seekTo.toString());
      }
      if (input.options.duration !== undefined) {
        args.push('-t', input.options.duration.toString());
      }
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    // Mappings
    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    if (this.noVideo) {
      args.push('-vn');
    }

    if (this.streamCopy) {
      args.push('-c', 'copy');
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec);
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);

      if (this.audioCodec.codec !== 'copy') {
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
        if (this.audioCodec.quality !== undefined) args.push('-q:a', this.audioCodec.quality.toString());
        if (this.audioCodec.sampleRate) args.push('-ar', this.audioCodec.sampleRate.toString());
      }
    }

    // Chapters
    if (this.mapChapters !== null) {
      args.push('-map_chapters', this.mapChapters.toString());
    }

    // Metadata
    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }
    for (const meta of this.metadata) {
      args.push('-metadata', `${meta.key}=${meta.value}`);
    }

    // Dispositions
    for (const disp of this.dispositions) {
      args.push(`-disposition:${disp.stream}`, disp.disposition);
    }

    // Output options
    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(): string {
    return formatCommand('ffmpeg', this.build());
  }
}

/**
 * Audio codec settings for one part under the resolved encoding parameters
 */
export function toAudioCodecOptions(
  encoding: EncodingParams,
  sourceSampleRate: number = 0
): AudioCodecOptions {
  const sampleRate = encoding.sampleRate === 'inherit'
    ? (sourceSampleRate > 0 ? sourceSampleRate : undefined)
    : encoding.sampleRate;

  return encoding.mode === 'cbr'
    ? { codec: 'aac', bitrate: encoding.bitrate, sampleRate }
    : { codec: 'aac', quality: encoding.quality, sampleRate };
}

/**
 * Re-encode one part to AAC in an MP4 container, dropping embedded pictures
 */
export function createPartEncodeCommand(
  inputFile: string,
  outputFile: string,
  audio: AudioCodecOptions
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapAudio(0, 0)
    .disableVideo()
    .setAudioCodec(audio)
    .setOutputOptions({ format: 'mp4' })
    .setOutput(outputFile);
}

/**
 * Copy the attached picture out of a part
 */
export function createCoverExtractCommand(
  inputFile: string,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapVideo(0, 0, false)
    .setVideoCodec('copy')
    .setOutputOptions({ format: 'image2', extraArgs: ['-frames:v', '1'] })
    .setOutput(outputFile);
}

export interface ConcatMuxOptions {
  concatListFile: string;
  metadataFile: string;
  coverFile?: string;
  outputFile: string;
}

/**
 * Concatenate encoded parts and attach tags, chapters and cover in one pass
 */
export function createConcatMuxCommand(options: ConcatMuxOptions): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder()
    .addInput(options.concatListFile, { format: 'concat', extraArgs: ['-safe', '0'] })
    .addInput(options.metadataFile, { format: 'ffmetadata' })
    .mapAudio(0);

  if (options.coverFile) {
    builder
      .addInput(options.coverFile)
      .mapVideo(2, 0, false)
      .setDisposition('v:0', 'attached_pic');
  }

  return builder
    .copyAllStreams()
    .copyMetadata(1)
    .copyChapters(1)
    .setOutputOptions({ format: 'mp4', movflags: '+faststart' })
    .setOutput(options.outputFile);
}

/**
 * Replace the chapters of a container, copying every stream
 */
export function createChapterApplyCommand(
  inputFile: string,
  metadataFile: string,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .addInput(metadataFile, { format: 'ffmetadata' })
    .map(0, 'a')
    .mapVideo(0)
    .copyAllStreams()
    .copyMetadata(1)
    .copyChapters(1)
    .setOutputOptions({ format: 'mp4', movflags: '+faststart' })
    .setOutput(outputFile);
}

/**
 * Cut one time range out of a container as its own file
 */
export function createSegmentCommand(
  inputFile: string,
  outputFile: string,
  startSeconds: number,
  durationSeconds: number,
  title: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInputWithSeek(inputFile, startSeconds, durationSeconds)
    .mapAudio(0)
    .mapVideo(0)
    .copyAllStreams()
    .copyMetadata(0)
    .addMetadata('title', title)
    .setOutputOptions({ format: 'mp4', extraArgs: ['-map_chapters', '-1'] })
    .setOutput(outputFile);
}
