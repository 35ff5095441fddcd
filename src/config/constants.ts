/**
 * Application-wide constants
 */

/** Prefix shared by every generator-specific environment variable */
export const ENV_PREFIX = 'DEOVR_JSON_GEN_';

export const DEFAULT_EXTENSIONS: readonly string[] = [
  'mp4',
  'mkv',
  'avi',
  'mov',
  'wmv',
  'flv',
  'webm',
  'm4v',
  'mpg',
  'mpeg',
  'm2v',
  'ts',
];

export const MANIFEST = {
  /** Name of the single library every scene is grouped under */
  LIBRARY_NAME: 'Library',
  THUMBNAIL_URL: 'https://www.iconsdb.com/icons/preview/red/video-play-xxl.png',
  INDENT: 4,
} as const;

export const BYTES_PER_MB = 1024 * 1024;

export const FFPROBE = {
  /** Timeout for the startup `-version` check */
  VERSION_CHECK_TIMEOUT: 5000,
  /** Output buffer for the `-show_format` JSON report */
  MAX_BUFFER: 16 * 1024 * 1024,
} as const;
