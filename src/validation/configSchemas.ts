import { z } from 'zod';

/**
 * Configuration Validation Schemas
 *
 * Shape checks for the resolved configuration. Filesystem checks (the
 * directory exists, the output is not a directory) live in ConfigManager.validate().
 */

const nonNegativeInt = (label: string) =>
  z.number().int(`${label} must be a whole number`).min(0, `${label} must not be negative`);

export const appConfigSchema = z.object({
  scan: z.object({
    directory: z.string().min(1, 'No path or directory were provided'),
    extensions: z
      .array(z.string().min(1, 'Extensions must not be empty'))
      .min(1, 'At least one extension is required'),
    ffprobePath: z.string().min(1),
  }),
  manifest: z.object({
    outputPath: z.string().min(1, 'Output path must not be empty'),
    baseUrl: z.string().url('Base URL must be an absolute URL'),
  }),
  filter: z.object({
    minSizeMB: nonNegativeInt('Minimum size'),
    minDurationSec: nonNegativeInt('Minimum duration'),
  }),
  scheduler: z.object({
    loopSeconds: nonNegativeInt('Loop interval'),
  }),
});
