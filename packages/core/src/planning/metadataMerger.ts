/**
 * Metadata Merger
 *
 * Builds the output's tag set from the parts' tags. For every tag in the
 * allow-list, the first part with a non-empty value supplies it; later
 * parts only fill gaps. Tags outside the allow-list are dropped.
 */

import { createLogger } from '@bookbinder/utils';
import { InvalidParameterError } from '../errors/index.js';
import type { CoverArtRef, InputFile, MergedMetadata } from '../types/plan.js';

const log = createLogger({ component: 'metadata-merger' });

export const DEFAULT_METADATA_TAGS = [
  'title',
  'artist',
  'album_artist',
  'album',
  'composer',
  'genre',
  'date',
  'comment',
  'description',
  'copyright',
  'publisher',
  'language',
] as const;

export type MetadataSource = Pick<InputFile, 'index' | 'path' | 'metadata' | 'hasCoverArt'>;

export interface MergeOptions {
  /** Recognized tag names; defaults to DEFAULT_METADATA_TAGS */
  allowList?: readonly string[];
  /** Values that win over anything found in the parts */
  overrides?: Readonly<Record<string, string>>;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * Look up a tag case-insensitively, returning its trimmed value if non-empty
 */
function readTag(metadata: Readonly<Record<string, string>>, tag: string): string | undefined {
  for (const [key, value] of Object.entries(metadata)) {
    if (normalizeKey(key) === tag && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

export function findCoverArt(sources: readonly MetadataSource[]): CoverArtRef | null {
  const source = sources.find((s) => s.hasCoverArt);
  return source ? { sourcePath: source.path, sourceIndex: source.index } : null;
}

export function mergeMetadata(
  sources: readonly MetadataSource[],
  options: MergeOptions = {}
): MergedMetadata {
  const allowList = (options.allowList ?? DEFAULT_METADATA_TAGS).map(normalizeKey);
  const allowed = new Set(allowList);
  const tags: Record<string, string> = {};

  for (const tag of allowList) {
    for (const source of sources) {
      const value = readTag(source.metadata, tag);
      if (value !== undefined) {
        tags[tag] = value;
        break;
      }
    }
  }

  for (const [rawKey, value] of Object.entries(options.overrides ?? {})) {
    const key = normalizeKey(rawKey);
    if (!allowed.has(key)) {
      throw new InvalidParameterError('metadata tag', rawKey, `one of: ${allowList.join(', ')}`, 'metadata');
    }
    tags[key] = value;
  }

  const coverArt = findCoverArt(sources);

  log.debug(
    { tags: Object.keys(tags), coverArt: coverArt?.sourcePath ?? null },
    'Merged metadata'
  );

  return { tags, coverArt };
}
