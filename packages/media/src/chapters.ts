/**
 * Container chapter reading
 *
 * Reads the chapter markers an existing audiobook already carries and
 * arranges them for display or splitting.
 */

import { ProbeError } from '@bookbinder/core';
import { FFProbe, type FFProbeResult, type ProbeRunner } from './probes/ffprobe.js';
import { normalizeTags } from './probeAdapter.js';
import type { ChapterInfo, ChapterNode, ContainerChapters } from './types.js';

/** Chapters shorter than this are treated as markers, not content */
export const MIN_CHAPTER_SECONDS = 1;

export function toChapterInfos(result: FFProbeResult): ChapterInfo[] {
  return result.chapters.map((chapter) => ({
    id: chapter.id,
    title: normalizeTags(chapter.tags)['title'] ?? `Chapter ${chapter.id}`,
    startTime: Number(chapter.start_time) || 0,
    endTime: Number(chapter.end_time) || 0,
  }));
}

export function filterShortChapters(
  chapters: readonly ChapterInfo[],
  minSeconds: number = MIN_CHAPTER_SECONDS
): ChapterInfo[] {
  return chapters.filter((c) => c.endTime - c.startTime >= minSeconds);
}

/**
 * Nest chapters by time range: a chapter that starts before the enclosing
 * chapter ends becomes its child.
 */
export function buildChapterHierarchy(chapters: readonly ChapterInfo[]): ChapterNode[] {
  const sorted = [...chapters].sort((a, b) => a.startTime - b.startTime);
  const roots: ChapterNode[] = [];
  const stack: ChapterNode[] = [];

  for (const chapter of sorted) {
    const node: ChapterNode = { ...chapter, children: [] };

    while (stack.length > 0 && chapter.startTime >= (stack[stack.length - 1]?.endTime ?? 0)) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}

export async function readContainerChapters(
  filePath: string,
  runner: ProbeRunner = new FFProbe()
): Promise<ContainerChapters> {
  let result: FFProbeResult;
  try {
    result = await runner.probe(filePath);
  } catch (error) {
    throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
  }

  const tags = normalizeTags(result.format?.tags);
  return {
    filePath,
    bookTitle: tags['title'] ?? 'Untitled',
    tags,
    chapters: toChapterInfos(result),
  };
}
