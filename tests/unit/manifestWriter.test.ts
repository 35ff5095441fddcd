/**
 * Manifest Writer Tests
 */

import fs from 'fs/promises';
import path from 'path';
import { ManifestWriter, serializeManifest } from '../../src/services/manifest/manifestWriter.js';
import { ErrorCode, FileSystemError } from '../../src/errors/index.js';
import type { Manifest } from '../../src/types/manifest.js';
import { createSilentLogger, createTempDir, removeTempDir } from '../utils/testHelpers.js';

const EMPTY_MANIFEST: Manifest = { scenes: [{ name: 'Library', list: [] }] };

const SAMPLE_MANIFEST: Manifest = {
  scenes: [
    {
      name: 'Library',
      list: [
        {
          title: 'clip',
          videoLength: 90,
          video_url: 'http://localhost/clip.mp4',
          thumbnailUrl: 'https://www.iconsdb.com/icons/preview/red/video-play-xxl.png',
          is3d: true,
          stereoMode: 'sbs',
          screenType: 'dome',
        },
      ],
    },
  ],
};

describe('serializeManifest', () => {
  it('should pretty-print with four spaces and no trailing newline', () => {
    expect(serializeManifest(EMPTY_MANIFEST)).toBe(
      [
        '{',
        '    "scenes": [',
        '        {',
        '            "name": "Library",',
        '            "list": []',
        '        }',
        '    ]',
        '}',
      ].join('\n')
    );
  });

  it('should escape non-ASCII characters', () => {
    const json = serializeManifest({ scenes: [{ name: 'Bibliothèque 🎬', list: [] }] });
    expect(json).toContain('"name": "Biblioth\\u00e8que \\ud83c\\udfac",');
  });

  it('should leave DEL and other ASCII control characters to JSON.stringify', () => {
    const json = serializeManifest({ scenes: [{ name: 'a\u007fb\tc', list: [] }] });
    expect(json).toContain('"name": "a\u007fb\\tc",');
  });

  it('should round-trip without losing fields', () => {
    expect(JSON.parse(serializeManifest(SAMPLE_MANIFEST))).toEqual(SAMPLE_MANIFEST);
    expect(JSON.parse(serializeManifest({ scenes: [{ name: 'Bibliothèque', list: [] }] }))).toEqual({
      scenes: [{ name: 'Bibliothèque', list: [] }],
    });
  });
});

describe('ManifestWriter', () => {
  let tempDir: string;
  let writer: ManifestWriter;

  beforeEach(async () => {
    tempDir = await createTempDir();
    writer = new ManifestWriter(createSilentLogger());
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should create missing parent directories', async () => {
    const target = path.join(tempDir, 'www', 'html', 'deovr');

    await writer.write(SAMPLE_MANIFEST, target);

    expect(await fs.readFile(target, 'utf8')).toBe(serializeManifest(SAMPLE_MANIFEST));
  });

  it('should replace an existing file and leave no temp file behind', async () => {
    const target = path.join(tempDir, 'deovr');
    await fs.writeFile(target, 'stale');

    await writer.write(EMPTY_MANIFEST, target);

    expect(await fs.readFile(target, 'utf8')).toBe(serializeManifest(EMPTY_MANIFEST));
    expect(await fs.readdir(tempDir)).toEqual(['deovr']);
  });

  it('should refuse to write when the target is a directory', async () => {
    const target = path.join(tempDir, 'deovr');
    await fs.mkdir(target);

    const attempt = writer.write(EMPTY_MANIFEST, target);

    await expect(attempt).rejects.toBeInstanceOf(FileSystemError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.FS_TARGET_IS_DIRECTORY });
    expect(await fs.readdir(target)).toEqual([]);
  });

  it('should report a failed write as a FileSystemError', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    await fs.writeFile(blocker, 'plain file');
    const target = path.join(blocker, 'deovr');

    const attempt = writer.write(EMPTY_MANIFEST, target);

    await expect(attempt).rejects.toBeInstanceOf(FileSystemError);
    await expect(attempt).rejects.toMatchObject({
      code: ErrorCode.FS_WRITE_FAILED,
      path: target,
      retryable: true,
      context: { service: 'manifestWriter', operation: 'write' },
    });
  });
});
