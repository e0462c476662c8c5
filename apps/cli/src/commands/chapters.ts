/**
 * Chapters Command
 *
 * Show the chapter structure of an existing audiobook.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  buildChapterHierarchy,
  FFProbe,
  filterShortChapters,
  readContainerChapters,
  type ChapterNode,
  type ProbeRunner,
} from '@bookbinder/media';
import { formatTimestamp } from '@bookbinder/utils';
import type { CliConfig } from '../config/index.js';
import { formatFailure, printError, printHeader, printInfo } from '../lib/output.js';

/**
 * One line per chapter, indented two spaces per nesting level
 */
export function renderChapterTree(nodes: readonly ChapterNode[], level: number = 0): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    const indent = '  '.repeat(level);
    const duration = node.endTime - node.startTime;
    lines.push(
      `${indent}- ${node.title} (start ${formatTimestamp(node.startTime)}, duration ${formatTimestamp(duration)})`
    );
    lines.push(...renderChapterTree(node.children, level + 1));
  }
  return lines;
}

export async function runChapters(path: string, runner: ProbeRunner): Promise<number> {
  const spinner = ora('Reading chapters...').start();

  try {
    const container = await readContainerChapters(path, runner);
    spinner.stop();

    const chapters = filterShortChapters(container.chapters);
    printHeader(`${container.bookTitle} ${chalk.gray(`(${chapters.length} chapters)`)}`);
    if (chapters.length === 0) {
      printInfo('No chapters found');
      return 0;
    }

    for (const line of renderChapterTree(buildChapterHierarchy(chapters))) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    spinner.fail();
    printError(formatFailure(error));
    return 1;
  }
}

export async function chaptersCommand(path: string, config: CliConfig): Promise<void> {
  const runner = new FFProbe(config.mediaTools.ffprobe, { timeout: config.commandTimeoutMs });
  process.exitCode = await runChapters(path, runner);
}
