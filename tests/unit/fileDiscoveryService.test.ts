/**
 * File Discovery Tests
 */

import fs from 'fs/promises';
import path from 'path';
import {
  discoverVideoFiles,
  matchesExtension,
  sortByModifiedDesc,
} from '../../src/services/scan/fileDiscoveryService.js';
import { ErrorCode, FileSystemError } from '../../src/errors/index.js';
import { createFile, createTempDir, removeTempDir } from '../utils/testHelpers.js';

describe('discoverVideoFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should return matching files newest first, across subdirectories', async () => {
    await createFile(root, 'a.mp4', 1_000_000);
    await createFile(root, path.join('sub', 'b.mkv'), 3_000_000);
    await createFile(root, 'c.mp4', 2_000_000);
    await createFile(root, 'notes.txt', 4_000_000);

    const files = await discoverVideoFiles(root, ['mp4', 'mkv']);

    expect(files).toEqual([
      path.join(root, 'sub', 'b.mkv'),
      path.join(root, 'c.mp4'),
      path.join(root, 'a.mp4'),
    ]);
  });

  it('should match extensions literally, including case', async () => {
    await createFile(root, 'upper.MP4');
    await createFile(root, 'lower.mp4');

    expect(await discoverVideoFiles(root, ['mp4'])).toEqual([path.join(root, 'lower.mp4')]);
    expect(await discoverVideoFiles(root, ['MP4'])).toEqual([path.join(root, 'upper.MP4')]);
  });

  it('should keep name order for files with the same modification time', async () => {
    await createFile(root, 'b.mp4');
    await createFile(root, path.join('sub', 'c.mp4'));
    await createFile(root, 'a.mp4');

    expect(await discoverVideoFiles(root, ['mp4'])).toEqual([
      path.join(root, 'a.mp4'),
      path.join(root, 'b.mp4'),
      path.join(root, 'sub', 'c.mp4'),
    ]);
  });

  it('should descend into directories whose names look like videos without listing them', async () => {
    await fs.mkdir(path.join(root, 'folder.mp4'));
    await createFile(root, path.join('folder.mp4', 'inner.mp4'));

    expect(await discoverVideoFiles(root, ['mp4'])).toEqual([path.join(root, 'folder.mp4', 'inner.mp4')]);
  });

  it('should return an empty list when nothing matches', async () => {
    await createFile(root, 'readme.md');

    expect(await discoverVideoFiles(root, ['mp4'])).toEqual([]);
  });

  it('should fail with a FileSystemError when the root cannot be read', async () => {
    const missing = path.join(root, 'missing');

    await expect(discoverVideoFiles(missing, ['mp4'])).rejects.toBeInstanceOf(FileSystemError);
    await expect(discoverVideoFiles(missing, ['mp4'])).rejects.toMatchObject({
      code: ErrorCode.FS_READ_FAILED,
      path: missing,
    });
  });
});

describe('matchesExtension', () => {
  it('should require a dot before the extension', () => {
    expect(matchesExtension('clip.mp4', ['mp4'])).toBe(true);
    expect(matchesExtension('clipmp4', ['mp4'])).toBe(false);
  });

  it('should support multi-part extensions', () => {
    expect(matchesExtension('clip.vr.mp4', ['vr.mp4'])).toBe(true);
  });
});

describe('sortByModifiedDesc', () => {
  it('should sort descending and keep ties in input order', () => {
    const sorted = sortByModifiedDesc([
      { id: 'a', mtimeMs: 1 },
      { id: 'b', mtimeMs: 5 },
      { id: 'c', mtimeMs: 1 },
      { id: 'd', mtimeMs: 3 },
    ]);

    expect(sorted.map(item => item.id)).toEqual(['b', 'd', 'a', 'c']);
  });
});
