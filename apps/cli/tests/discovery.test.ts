import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DiscoveryError } from '@bookbinder/core';
import { discoverBook, parsePartName, selectBookParts } from '../src/lib/discovery.js';

describe('parsePartName', () => {
  it('splits book name, part number and extension', () => {
    expect(parsePartName('Test Book (12).MP3')).toEqual({
      bookName: 'Test Book',
      partNumber: 12,
      extension: 'mp3',
    });
  });

  it('rejects files without a part number or with other extensions', () => {
    expect(parsePartName('Test Book.mp3')).toBeNull();
    expect(parsePartName('Test Book (1).aax')).toBeNull();
    expect(parsePartName('cover.jpg')).toBeNull();
  });
});

describe('selectBookParts', () => {
  it('orders parts by number, not by name', () => {
    const result = selectBookParts([
      'Test Book (10).mp3',
      'Test Book (2).mp3',
      'notes.txt',
      'Test Book (1).mp3',
    ]);

    expect(result).toEqual({
      bookName: 'Test Book',
      parts: ['Test Book (1).mp3', 'Test Book (2).mp3', 'Test Book (10).mp3'],
    });
  });

  it('takes the alphabetically first book and ignores the others', () => {
    const result = selectBookParts(['Zebra (1).m4a', 'Alpha (2).m4a', 'Alpha (1).m4a']);

    expect(result).toEqual({ bookName: 'Alpha', parts: ['Alpha (1).m4a', 'Alpha (2).m4a'] });
  });

  it('rejects a part number used twice', () => {
    expect(() => selectBookParts(['Test Book (1).mp3', 'Test Book (1).m4a'])).toThrow(
      "Part number 1 appears twice: 'Test Book (1).m4a' and 'Test Book (1).mp3'"
    );
  });

  it('fails when no part files are present', () => {
    expect(() => selectBookParts(['readme.txt'])).toThrow(DiscoveryError);
  });
});

describe('discoverBook', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bookbinder-discovery-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns absolute part paths and the output path beside them', async () => {
    await writeFile(join(dir, 'Test Book (2).mp3'), '');
    await writeFile(join(dir, 'Test Book (1).mp3'), '');

    const book = await discoverBook(dir);

    expect(book).toEqual({
      bookName: 'Test Book',
      directory: dir,
      parts: [join(dir, 'Test Book (1).mp3'), join(dir, 'Test Book (2).mp3')],
      outputPath: join(dir, 'Test Book.m4b'),
    });
  });

  it('reports a directory it cannot read', async () => {
    const missing = join(dir, 'missing');

    await expect(discoverBook(missing)).rejects.toThrow(`Cannot read directory '${missing}'`);
  });

  it('fails on an empty directory', async () => {
    const empty = join(dir, 'empty');
    await mkdir(empty);

    await expect(discoverBook(empty)).rejects.toThrow(DiscoveryError);
  });
});
