/**
 * URL list and local article directory tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  readUrlList,
  readUrlLists,
  listLocalFiles,
  buildDescriptors,
  isSupportedFile,
} from '../../../src/services/ingestion/source-list.js';
import { cleanupTempDir, createTempDir } from '../../setup/fixtures.js';

describe('source lists', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('sources');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    cleanupTempDir(dir);
    vi.restoreAllMocks();
  });

  describe('readUrlList', () => {
    it('should skip blank lines and comments', async () => {
      const file = join(dir, 'urls.txt');
      writeFileSync(file, '# reading list\nhttps://a.example/1\n\n  https://b.example/2  \r\n#https://c.example/3\n');

      expect(await readUrlList(file)).toEqual(['https://a.example/1', 'https://b.example/2']);
    });

    it('should treat a missing file as empty', async () => {
      expect(await readUrlList(join(dir, 'missing.txt'))).toEqual([]);
      expect(console.error).toHaveBeenCalledWith(
        `[Sources] WARNING: URL file not found, skipping: ${join(dir, 'missing.txt')}`
      );
    });

    it('should concatenate several lists in order', async () => {
      writeFileSync(join(dir, 'one.txt'), 'https://a.example/1\n');
      writeFileSync(join(dir, 'two.txt'), 'https://b.example/2\n');

      expect(await readUrlLists([join(dir, 'two.txt'), join(dir, 'one.txt')])).toEqual([
        'https://b.example/2',
        'https://a.example/1',
      ]);
    });
  });

  describe('listLocalFiles', () => {
    it('should list supported files sorted by name', async () => {
      const names = ['b.md', 'a.txt', '.hidden.txt', 'urls.txt', 'doc.pdf', 'deck.epub', 'memo.docx', 'c.HTML'];
      for (const name of names) {
        writeFileSync(join(dir, name), 'content');
      }
      mkdirSync(join(dir, 'notes.md'));

      expect(await listLocalFiles(dir)).toEqual([
        join(dir, 'a.txt'),
        join(dir, 'b.md'),
        join(dir, 'c.HTML'),
        join(dir, 'doc.pdf'),
        join(dir, 'memo.docx'),
      ]);
    });

    it('should return nothing for a missing directory', async () => {
      expect(await listLocalFiles(join(dir, 'absent'))).toEqual([]);
    });
  });

  it('should recognise supported extensions case-insensitively', () => {
    expect(isSupportedFile('essay.MARKDOWN')).toBe(true);
    expect(isSupportedFile('page.htm')).toBe(true);
    expect(isSupportedFile('paper.PDF')).toBe(true);
    expect(isSupportedFile('notes.docx')).toBe(true);
    expect(isSupportedFile('slides.pptx')).toBe(false);
    expect(isSupportedFile('README')).toBe(false);
  });

  it('should put URLs first without repeats, then files', () => {
    expect(
      buildDescriptors(
        ['https://a.example/1', 'https://b.example/2', 'https://a.example/1'],
        ['/articles/a.txt']
      )
    ).toEqual([
      { origin: { kind: 'url', url: 'https://a.example/1' } },
      { origin: { kind: 'url', url: 'https://b.example/2' } },
      { origin: { kind: 'file', path: '/articles/a.txt' } },
    ]);
  });
});
