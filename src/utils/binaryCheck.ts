/**
 * Binary Availability Checker
 *
 * Verifies that ffprobe can be executed before the first scan. A missing
 * binary is reported but does not stop the run: every file then probes as
 * 0 MB / 0 s and is filtered out.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { FFPROBE } from '../config/constants.js';
import type { Logger } from './logger.js';
import { getErrorMessage } from './errorHandling.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

export type VersionRunner = (
  file: string,
  args: string[],
  options: { timeout: number }
) => Promise<{ stdout: string; stderr: string }>;

const runVersion: VersionRunner = (file, args, options) => execFilePromise(file, args, options);

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(
  binaryName: string,
  versionArgs: string[] = ['-version'],
  run: VersionRunner = runVersion
): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await run(binaryName, versionArgs, {
      timeout: FFPROBE.VERSION_CHECK_TIMEOUT,
    });

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+(\S+)/i);

    return {
      binary: binaryName,
      available: true,
      version: versionMatch ? versionMatch[1] : 'unknown',
    };
  } catch (error) {
    return {
      binary: binaryName,
      available: false,
      error: getErrorMessage(error),
    };
  }
}

/**
 * Check the probe binary at startup and log the outcome
 */
export async function checkRequiredBinaries(
  ffprobePath: string,
  logger: Logger,
  run: VersionRunner = runVersion
): Promise<BinaryCheckResult> {
  logger.debug('Checking binary dependencies...');

  const result = await checkBinary(ffprobePath, ['-version'], run);

  if (result.available) {
    logger.info(`✓ ${ffprobePath} found`, {
      service: 'binaryCheck',
      binary: ffprobePath,
      version: result.version,
    });
  } else {
    logger.error(
      `REQUIRED DEPENDENCY MISSING: ${ffprobePath} is required to read video length and size. ` +
        'Every file will be skipped until FFmpeg is installed: https://ffmpeg.org/download.html',
      {
        service: 'binaryCheck',
        binary: ffprobePath,
        error: result.error,
      }
    );
  }

  return result;
}
