/**
 * @bookbinder/processing
 *
 * Encoding and muxing layer.
 *
 * Rules:
 * - Parts are re-encoded once; the final mux is stream copy
 * - Intermediate files never outlive the run
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export {
  FFmpeg,
  describeFailure,
  type FFmpegRunner,
  type FFmpegResult,
  type FFmpegOptions,
} from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  toAudioCodecOptions,
  createPartEncodeCommand,
  createCoverExtractCommand,
  createConcatMuxCommand,
  createChapterApplyCommand,
  createSegmentCommand,
  type AudioCodecOptions,
  type ConcatMuxOptions,
  type InputOptions,
  type OutputOptions,
} from './commandBuilder.js';

// Metadata files
export {
  FFMETADATA_HEADER,
  escapeMetadataValue,
  toFFMetadata,
  toConcatList,
} from './packaging/ffmetadata.js';

// Muxer
export { AudiobookMuxer, type AudiobookMuxerOptions } from './muxer.js';

// Chapter editing
export {
  ChapterEditor,
  type ApplyChaptersOptions,
  type SplitChaptersOptions,
} from './chapterEditor.js';
