/**
 * @bookbinder/media
 *
 * Media probing layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe
 * - Normalize probe output into InputFile records
 * - Read and arrange chapters of existing containers
 */

// Probing
export {
  FFProbe,
  parseProbeOutput,
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
  type FFProbeChapter,
  type FFProbeOptions,
  type ProbeRunner,
} from './probes/ffprobe.js';

export {
  ProbeAdapter,
  toInputFile,
  normalizeTags,
  hasAttachedPicture,
} from './probeAdapter.js';

// Chapters
export {
  MIN_CHAPTER_SECONDS,
  toChapterInfos,
  filterShortChapters,
  buildChapterHierarchy,
  readContainerChapters,
} from './chapters.js';

// Types
export type {
  ChapterInfo,
  ChapterNode,
  ContainerChapters,
} from './types.js';
