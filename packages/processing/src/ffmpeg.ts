/**
 * FFmpeg Wrapper
 *
 * Runs ffmpeg with argument arrays and logs every command executed.
 */

import { createLogger, executeCommand, formatCommand } from '@bookbinder/utils';

const log = createLogger({ component: 'ffmpeg' });

export interface FFmpegResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Anything that can run an ffmpeg argument list
 */
export interface FFmpegRunner {
  execute(args: string[]): Promise<FFmpegResult>;
}

export interface FFmpegOptions {
  timeout?: number;
}

export class FFmpeg implements FFmpegRunner {
  private ffmpegPath: string;
  private timeout: number;

  constructor(ffmpegPath: string = 'ffmpeg', options: FFmpegOptions = {}) {
    this.ffmpegPath = ffmpegPath;
    this.timeout = options.timeout ?? 3600000; // 1 hour default
  }

  /**
   * Execute an FFmpeg command
   */
  async execute(args: string[]): Promise<FFmpegResult> {
    const fullArgs = [
      '-hide_banner',
      '-nostdin',
      '-v', 'error',
      '-y', // Overwrite output
      ...args,
    ];

    log.debug({ command: formatCommand(this.ffmpegPath, fullArgs) }, 'Running ffmpeg');

    const result = await executeCommand(this.ffmpegPath, fullArgs, {
      timeout: this.timeout,
    });

    if (result.timedOut) {
      return {
        exitCode: result.exitCode === 0 ? -1 : result.exitCode,
        stdout: result.stdout,
        stderr: `${result.stderr}\nffmpeg timed out after ${this.timeout}ms`.trim(),
      };
    }

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}

/**
 * Diagnostic text for a failed run: stderr as ffmpeg wrote it, or the exit
 * code when it wrote nothing.
 */
export function describeFailure(result: FFmpegResult): string {
  const stderr = result.stderr.trim();
  return stderr.length > 0 ? stderr : `ffmpeg exited with code ${result.exitCode}`;
}
