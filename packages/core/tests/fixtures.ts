import type { InputFile } from '../src/types/plan.js';

export function inputFile(index: number, overrides: Partial<InputFile> = {}): InputFile {
  return {
    index,
    path: `/books/Test Book (${index}).mp3`,
    duration: 600,
    bitrate: 128000,
    sampleRate: 44100,
    metadata: {},
    hasCoverArt: false,
    ...overrides,
  };
}
