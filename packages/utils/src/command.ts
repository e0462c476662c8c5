/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Argument arrays (never a shell string)
 * - Timeout handling
 * - Output capture
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
}

// Output beyond this many bytes per stream is dropped
const MAX_OUTPUT_SIZE = 10 * 1024 * 1024;

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300000 } = options; // 5 minutes default

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_OUTPUT_SIZE) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    const settle = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('close', (code, exitSignal) => {
      settle();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      settle();
      reject(error);
    });
  });
}

/**
 * Render a command line for logs and previews.
 * Arguments containing whitespace or quotes are double-quoted.
 */
export function formatCommand(command: string, args: readonly string[]): string {
  const quoted = args.map((arg) =>
    /[\s"']/.test(arg) ? `"${arg.replace(/(["\\])/g, '\\$1')}"` : arg
  );
  return [command, ...quoted].join(' ');
}
