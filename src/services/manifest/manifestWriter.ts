import fs from 'fs-extra';
import path from 'path';
import { MANIFEST } from '../../config/constants.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import type { Manifest } from '../../types/manifest.js';
import type { Logger } from '../../utils/logger.js';
import { getErrorMessage, isPermissionError, toError } from '../../utils/errorHandling.js';

/**
 * Pretty-print with 4-space indentation and every non-ASCII character
 * written as a \uXXXX escape, so the file is plain ASCII.
 * No trailing newline.
 */
export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(manifest, null, MANIFEST.INDENT).replace(
    /[\u0080-\uffff]/g,
    char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Manifest Writer
 *
 * Writes the scene list next to the target as a temp file, then renames it
 * into place so readers never see a half-written file.
 */
export class ManifestWriter {
  constructor(private readonly logger: Logger) {}

  async write(manifest: Manifest, targetPath: string): Promise<void> {
    const isDirectory = await fs.stat(targetPath).then(
      stats => stats.isDirectory(),
      () => false
    );
    if (isDirectory) {
      throw new FileSystemError(
        `Refusing to write scene list: ${targetPath} is a directory`,
        ErrorCode.FS_TARGET_IS_DIRECTORY,
        targetPath,
        false,
        { service: 'manifestWriter', operation: 'write' }
      );
    }

    const tempPath = path.join(
      path.dirname(targetPath),
      `.${path.basename(targetPath)}.${process.pid}.tmp`
    );

    try {
      // outputFile creates missing parent directories
      await fs.outputFile(tempPath, serializeManifest(manifest), 'utf8');
      await fs.move(tempPath, targetPath, { overwrite: true });
    } catch (error) {
      // The write error is the one reported; a leftover temp file is only noted
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        this.logger.debug('Could not remove temporary scene list', {
          tempPath,
          error: getErrorMessage(cleanupError),
        });
      });
      throw new FileSystemError(
        `Failed to write scene list: ${getErrorMessage(error)}`,
        isPermissionError(error) ? ErrorCode.FS_PERMISSION_DENIED : ErrorCode.FS_WRITE_FAILED,
        targetPath,
        !isPermissionError(error),
        { service: 'manifestWriter', operation: 'write' },
        toError(error)
      );
    }

    this.logger.debug('Wrote scene list', {
      targetPath,
      scenes: manifest.scenes.reduce((total, library) => total + library.list.length, 0),
    });
  }
}
