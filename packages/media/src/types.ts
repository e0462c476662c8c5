/**
 * Media Types
 */

export interface ChapterInfo {
  id: number;
  title: string;
  startTime: number;   // seconds
  endTime: number;     // seconds
}

export interface ChapterNode extends ChapterInfo {
  children: ChapterNode[];
}

export interface ContainerChapters {
  filePath: string;
  bookTitle: string;
  tags: Record<string, string>;
  chapters: ChapterInfo[];
}
