import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { BYTES_PER_MB, FFPROBE } from '../../config/constants.js';
import { ProcessError } from '../../errors/index.js';
import type { MediaMetrics } from '../../types/media.js';
import type { Logger } from '../../utils/logger.js';
import { createErrorLogContext, getErrorCode, getErrorMessage, toError } from '../../utils/errorHandling.js';

const execFilePromise = promisify(execFile);

/**
 * FFprobe Service
 *
 * Reads container-level size and duration for a video file. Only the
 * `format` section of ffprobe's output is used; stream details are not needed
 * for the scene list.
 */

/**
 * Anything that can report size and duration for a file.
 * Implementations must not throw for unreadable media: they return zeros.
 */
export interface MetadataProbe {
  probe(filePath: string): Promise<MediaMetrics>;
}

export type CommandRunner = (
  file: string,
  args: string[]
) => Promise<{ stdout: string; stderr: string }>;

const runCommand: CommandRunner = (file, args) =>
  execFilePromise(file, args, { maxBuffer: FFPROBE.MAX_BUFFER });

export const EMPTY_METRICS: Readonly<MediaMetrics> = Object.freeze({ sizeMB: 0, durationSec: 0 });

/**
 * Raw ffprobe output (only the fields read here). ffprobe prints numbers
 * inside the format section as strings.
 */
const ffprobeOutputSchema = z.object({
  format: z
    .object({
      size: z.string().optional(),
      duration: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type FFprobeFormat = NonNullable<z.infer<typeof ffprobeOutputSchema>['format']>;

function toWholeNumber(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/**
 * Convert the format section to whole megabytes and whole seconds (truncated)
 */
export function toMediaMetrics(format: FFprobeFormat | undefined): MediaMetrics {
  if (!format) {
    return { ...EMPTY_METRICS };
  }

  const bytes = format.size !== undefined ? Number(format.size) : 0;
  const seconds = format.duration !== undefined ? Number(format.duration) : 0;

  return {
    sizeMB: toWholeNumber(bytes / BYTES_PER_MB),
    durationSec: toWholeNumber(seconds),
  };
}

export class FfprobeMetadataProbe implements MetadataProbe {
  constructor(
    private readonly logger: Logger,
    private readonly ffprobePath = 'ffprobe',
    private readonly run: CommandRunner = runCommand
  ) {}

  async probe(filePath: string): Promise<MediaMetrics> {
    const startTime = Date.now();

    try {
      const format = await this.readFormat(filePath);
      const metrics = toMediaMetrics(format);

      this.logger.debug('Extracted media info via FFprobe', {
        filePath,
        ...metrics,
        hasFormat: format !== undefined,
        timeMs: Date.now() - startTime,
      });

      return metrics;
    } catch (error) {
      this.logger.warn(
        'FFprobe could not read file, treating as empty',
        createErrorLogContext(error, { filePath })
      );
      return { ...EMPTY_METRICS };
    }
  }

  /**
   * Run ffprobe and return its format section.
   * File path is passed as a separate argument, never through a shell.
   */
  private async readFormat(filePath: string): Promise<FFprobeFormat | undefined> {
    const args = ['-v', 'quiet', '-print_format', 'json', '-show_format', filePath];

    let stdout: string;
    try {
      ({ stdout } = await this.run(this.ffprobePath, args));
    } catch (error) {
      throw new ProcessError(
        'ffprobe',
        getErrorCode(error) ?? -1,
        `FFprobe failed: ${getErrorMessage(error)}`,
        { service: 'ffprobe', operation: 'probe', metadata: { filePath } },
        toError(error)
      );
    }

    const parsed = ffprobeOutputSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) {
      throw new ProcessError(
        'ffprobe',
        0,
        `Unexpected FFprobe output: ${parsed.error.message}`,
        { service: 'ffprobe', operation: 'probe', metadata: { filePath } }
      );
    }
    return parsed.data.format;
  }
}
