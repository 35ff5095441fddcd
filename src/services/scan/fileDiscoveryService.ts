import type { Dirent, Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';

/**
 * File Discovery
 *
 * Recursively lists files under a library root whose names end in one of the
 * configured extensions, newest first.
 *
 * Extensions are matched literally (case as given); callers normalize case
 * if they want case-insensitive matching. Directory entries are visited in
 * name order so the result is deterministic when modification times tie.
 */

interface DiscoveredFile {
  filePath: string;
  mtimeMs: number;
}

export function matchesExtension(fileName: string, extensions: readonly string[]): boolean {
  return extensions.some(ext => fileName.endsWith(`.${ext}`));
}

/**
 * Sort newest-first. Array.prototype.sort is stable, so ties keep discovery order.
 */
export function sortByModifiedDesc<T extends { mtimeMs: number }>(files: T[]): T[] {
  return [...files].sort((a, b) => b.mtimeMs - a.mtimeMs);
}

async function walk(
  directory: string,
  extensions: readonly string[],
  found: DiscoveredFile[]
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(
      `Failed to read directory: ${getErrorMessage(error)}`,
      ErrorCode.FS_READ_FAILED,
      directory,
      true,
      { service: 'fileDiscovery', operation: 'readdir' },
      toError(error)
    );
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);

    // Symlinked directories are not followed
    if (entry.isDirectory()) {
      await walk(entryPath, extensions, found);
      continue;
    }

    if (!matchesExtension(entry.name, extensions)) {
      continue;
    }

    let stats: Stats;
    try {
      stats = await fs.stat(entryPath);
    } catch (error) {
      // Removed mid-scan, or a dangling symlink
      if (getErrorCode(error) === 'ENOENT') {
        continue;
      }
      throw new FileSystemError(
        `Failed to stat file: ${getErrorMessage(error)}`,
        ErrorCode.FS_READ_FAILED,
        entryPath,
        true,
        { service: 'fileDiscovery', operation: 'stat' },
        toError(error)
      );
    }

    if (stats.isFile()) {
      found.push({ filePath: entryPath, mtimeMs: stats.mtimeMs });
    }
  }
}

/**
 * List matching video files under `rootDirectory`, most recently modified first
 */
export async function discoverVideoFiles(
  rootDirectory: string,
  extensions: readonly string[]
): Promise<string[]> {
  const found: DiscoveredFile[] = [];
  await walk(rootDirectory, extensions, found);
  return sortByModifiedDesc(found).map(file => file.filePath);
}
