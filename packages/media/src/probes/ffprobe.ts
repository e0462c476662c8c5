/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Extracts format, stream and chapter metadata in JSON format.
 */

import { z } from 'zod';
import { executeCommand } from '@bookbinder/utils';

const tagsSchema = z.record(z.string(), z.string());

const streamSchema = z.object({
  index: z.number(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  duration: z.string().optional(),
  bit_rate: z.string().optional(),
  sample_rate: z.string().optional(),
  channels: z.number().optional(),
  channel_layout: z.string().optional(),
  disposition: z.record(z.string(), z.number()).optional(),
  tags: tagsSchema.optional(),
});

const chapterSchema = z.object({
  id: z.number(),
  time_base: z.string().optional(),
  start_time: z.string(),
  end_time: z.string(),
  tags: tagsSchema.optional(),
});

const formatSchema = z.object({
  filename: z.string().optional(),
  format_name: z.string().optional(),
  duration: z.string().optional(),
  size: z.string().optional(),
  bit_rate: z.string().optional(),
  tags: tagsSchema.optional(),
});

export const ffprobeResultSchema = z.object({
  format: formatSchema.optional(),
  streams: z.array(streamSchema).default([]),
  chapters: z.array(chapterSchema).default([]),
});

export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;
export type FFProbeStream = z.infer<typeof streamSchema>;
export type FFProbeChapter = z.infer<typeof chapterSchema>;

/**
 * Anything that can probe a file into ffprobe's JSON shape
 */
export interface ProbeRunner {
  probe(filePath: string): Promise<FFProbeResult>;
}

export interface FFProbeOptions {
  timeout?: number;
}

export class FFProbe implements ProbeRunner {
  private ffprobePath: string;
  private timeout: number;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.timeout = options.timeout ?? 60000; // 1 minute
  }

  /**
   * Probe a media file and return its format, streams and chapters
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_chapters',
      '-show_error',
      filePath,
    ];

    const result = await executeCommand(this.ffprobePath, args, {
      timeout: this.timeout,
    });

    if (result.timedOut) {
      throw new Error(`ffprobe timed out after ${this.timeout}ms`);
    }
    if (result.exitCode !== 0) {
      throw new Error(`ffprobe failed with exit code ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`);
    }

    return parseProbeOutput(result.stdout);
  }
}

/**
 * Validate ffprobe's JSON output
 */
export function parseProbeOutput(stdout: string): FFProbeResult {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new Error(`Failed to parse ffprobe output: ${stdout.substring(0, 200)}`);
  }

  const parsed = ffprobeResultSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  return parsed.data;
}
