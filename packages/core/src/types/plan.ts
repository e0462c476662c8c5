/**
 * Plan Types
 *
 * Records produced while planning a combine run. All of them are
 * read-only once created.
 */

export interface InputFile {
  readonly index: number;          // 1-based position in combine order
  readonly path: string;
  readonly duration: number;       // seconds, > 0
  readonly bitrate: number;        // bits/sec, 0 when unknown
  readonly sampleRate: number;     // Hz, 0 when unknown
  readonly metadata: Readonly<Record<string, string>>;
  readonly hasCoverArt: boolean;
}

export interface ChapterSpec {
  readonly index: number;
  readonly title: string;
  readonly start: number;          // seconds
  readonly end: number;            // seconds
}

export type SampleRate = number | 'inherit';

export type ParamSource = 'estimated' | 'explicit';

export interface CbrParams {
  readonly mode: 'cbr';
  readonly bitrate: string;        // e.g. "128k"
  readonly sampleRate: SampleRate;
  readonly source: ParamSource;
}

export interface VbrParams {
  readonly mode: 'vbr';
  readonly quality: number;        // 0 (best) .. 5 (worst)
  readonly sampleRate: SampleRate;
  readonly source: ParamSource;
}

export type EncodingParams = CbrParams | VbrParams;

export interface CoverArtRef {
  readonly sourcePath: string;
  readonly sourceIndex: number;
}

export interface MergedMetadata {
  readonly tags: Readonly<Record<string, string>>;
  readonly coverArt: CoverArtRef | null;
}

export interface CombinePlan {
  readonly inputs: readonly InputFile[];
  readonly chapters: readonly ChapterSpec[];
  readonly encoding: EncodingParams;
  readonly metadata: MergedMetadata;
  readonly outputPath: string;
  readonly dryRun: boolean;
  readonly cleanAfter: boolean;
}

/**
 * Everything the encoder/muxer needs for one output file
 */
export interface MuxRequest {
  readonly inputPaths: readonly string[];
  readonly encoding: EncodingParams;
  readonly chapters: readonly ChapterSpec[];
  readonly metadata: MergedMetadata;
  readonly outputPath: string;
  /** First part's sample rate, used when encoding.sampleRate is 'inherit' (0 = unknown) */
  readonly sourceSampleRate: number;
}

/**
 * Probes input files into InputFile records, in order
 */
export interface InputProber {
  probeAll(paths: readonly string[]): Promise<InputFile[]>;
}

/**
 * Encodes, concatenates and muxes the parts into the output container
 */
export interface CombineMuxer {
  encodeAndMux(request: MuxRequest): Promise<void>;
}
