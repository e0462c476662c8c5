/**
 * @bookbinder/core
 *
 * Planning engine for combining audiobook parts:
 * - Encoding parameter resolution
 * - Chapter titles and timeline
 * - Metadata merging
 * - Plan assembly, preview and execution gate
 * - Error taxonomy
 */

// Errors
export {
  BookbinderError,
  ProbeError,
  TitleCountMismatchError,
  InvalidParameterError,
  LengthMismatchError,
  PlanInvariantError,
  EncodeError,
  DiscoveryError,
  isBookbinderError,
  type Stage,
} from './errors/index.js';

// Types
export type {
  InputFile,
  ChapterSpec,
  SampleRate,
  ParamSource,
  CbrParams,
  VbrParams,
  EncodingParams,
  CoverArtRef,
  MergedMetadata,
  CombinePlan,
  MuxRequest,
  InputProber,
  CombineMuxer,
} from './types/plan.js';

// Parameter resolution
export {
  BITRATE_TIERS,
  MIN_VBR_QUALITY,
  MAX_VBR_QUALITY,
  tierFor,
  estimateCbrBitrate,
  estimateVbrQuality,
  resolveEncodingParams,
  type BitrateTier,
  type EncodingOverrides,
} from './planning/parameterResolver.js';

// Chapter titles
export {
  DEFAULT_CHAPTER_THRESHOLD,
  stripNumberingPrefix,
  parseTitles,
  generateTitles,
  readTitlesFile,
  resolveChapterTitles,
  type TitleOptions,
} from './planning/chapterTitles.js';

// Timeline
export { buildTimeline, totalDuration } from './planning/timeline.js';

// Chapter lists
export {
  parseChapterList,
  chapterListToTimeline,
  type ChapterListEntry,
} from './planning/chapterList.js';

// Metadata
export {
  DEFAULT_METADATA_TAGS,
  findCoverArt,
  mergeMetadata,
  type MetadataSource,
  type MergeOptions,
} from './planning/metadataMerger.js';

// Plan assembly and execution
export {
  assemblePlan,
  describeEncoding,
  renderPlan,
  removeParts,
  executePlan,
  type PlanParts,
  type ExecuteDependencies,
  type ExecuteResult,
  type CleanFailure,
} from './planning/planAssembler.js';

export {
  CombinePlanner,
  type PlanOptions,
} from './planning/planner.js';
