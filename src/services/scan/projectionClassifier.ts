import path from 'path';
import type { ScreenType, StereoMode } from '../../types/manifest.js';

/**
 * Projection Classifier
 *
 * Guesses how a VR video is packed (stereo mode) and projected (screen type)
 * from tokens in its file name. Matching is case-insensitive substring
 * containment; rules are tried top to bottom and the first hit wins.
 * The two classifications are independent of each other.
 */

export interface ClassificationRule<T> {
  tokens: readonly string[];
  result: T;
}

export interface Classification {
  stereoMode: StereoMode;
  screenType: ScreenType;
}

export const STEREO_MODE_RULES: readonly ClassificationRule<StereoMode>[] = [
  { tokens: ['tb', 'top-bottom', 'over-under', '3dv'], result: 'tb' },
  { tokens: ['cuv', 'custom_uv'], result: 'cuv' },
  { tokens: ['off', '2d', 'mono', 'single'], result: 'off' },
];

export const DEFAULT_STEREO_MODE: StereoMode = 'sbs';

export const SCREEN_TYPE_RULES: readonly ClassificationRule<ScreenType>[] = [
  { tokens: ['rf52', '190', 'fisheye190'], result: 'rf52' },
  { tokens: ['mkx200', '200', 'fisheye200'], result: 'mkx200' },
  { tokens: ['sphere', '360', 'full'], result: 'sphere' },
  { tokens: ['fisheye'], result: 'fisheye' },
];

export const DEFAULT_SCREEN_TYPE: ScreenType = 'dome';

export function applyRules<T>(
  fileName: string,
  rules: readonly ClassificationRule<T>[],
  fallback: T
): T {
  const name = fileName.toLowerCase();
  for (const rule of rules) {
    if (rule.tokens.some(token => name.includes(token))) {
      return rule.result;
    }
  }
  return fallback;
}

export function classifyStereoMode(fileName: string): StereoMode {
  return applyRules(fileName, STEREO_MODE_RULES, DEFAULT_STEREO_MODE);
}

export function classifyScreenType(fileName: string): ScreenType {
  return applyRules(fileName, SCREEN_TYPE_RULES, DEFAULT_SCREEN_TYPE);
}

/**
 * Classify by the file's base name (directories in the path are ignored)
 */
export function classifyFilename(filePath: string): Classification {
  const fileName = path.basename(filePath);
  return {
    stereoMode: classifyStereoMode(fileName),
    screenType: classifyScreenType(fileName),
  };
}
