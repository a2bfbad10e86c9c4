/**
 * Local File Storage Unit Tests
 */

import { readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { candidatePath, createLocalFileStorage } from '@/services/file.storage.js';

import { createTempDir, removeTempDir } from '../../helpers/test-utils.js';

describe('candidatePath', () => {
  it('should use the declared name for k = 0', () => {
    expect(candidatePath('/drop', 'book.epub', 0)).toBe(path.join('/drop', 'book.epub'));
  });

  it('should insert the suffix before the extension', () => {
    expect(candidatePath('/drop', 'book.epub', 1)).toBe(path.join('/drop', 'book_1.epub'));
    expect(candidatePath('/drop', 'book.tar.gz', 2)).toBe(path.join('/drop', 'book.tar_2.gz'));
  });

  it('should append the suffix when there is no extension', () => {
    expect(candidatePath('/drop', 'README', 3)).toBe(path.join('/drop', 'README_3'));
  });
});

describe('LocalFileStorage', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('createUnique', () => {
    it('should create the declared name when it is free', async () => {
      const storage = createLocalFileStorage(root);

      const created = await storage.createUnique('book.epub');
      await created.handle.close();

      expect(created.path).toBe(path.join(root, 'book.epub'));
    });

    it('should pick the smallest free suffix on collision', async () => {
      await writeFile(path.join(root, 'book.epub'), 'a');
      await writeFile(path.join(root, 'book_1.epub'), 'b');
      const storage = createLocalFileStorage(root);

      const created = await storage.createUnique('book.epub');
      await created.handle.close();

      expect(created.path).toBe(path.join(root, 'book_2.epub'));
    });

    it('should never hand out the same path to concurrent callers', async () => {
      const storage = createLocalFileStorage(root);

      const created = await Promise.all(
        Array.from({ length: 5 }, () => storage.createUnique('same.pdf'))
      );
      await Promise.all(created.map((c) => c.handle.close()));

      const paths = created.map((c) => path.basename(c.path)).sort();
      expect(paths).toEqual([
        'same.pdf',
        'same_1.pdf',
        'same_2.pdf',
        'same_3.pdf',
        'same_4.pdf',
      ]);
      expect((await readdir(root)).sort()).toEqual(paths);
    });
  });

  describe('remove', () => {
    it('should delete a file and ignore a missing one', async () => {
      const storage = createLocalFileStorage(root);
      const created = await storage.createUnique('gone.txt');
      await created.handle.close();

      await storage.remove(created.path);
      await storage.remove(created.path);

      expect(await readdir(root)).toEqual([]);
    });
  });

  describe('ensureRoot', () => {
    it('should create a nested root directory', async () => {
      const nested = path.join(root, 'a', 'b');
      const storage = createLocalFileStorage(nested);

      await storage.ensureRoot();

      expect(await readdir(nested)).toEqual([]);
    });
  });
});
