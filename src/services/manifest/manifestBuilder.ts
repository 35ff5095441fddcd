import path from 'path';
import { MANIFEST } from '../../config/constants.js';
import type { Library, Manifest, Scene } from '../../types/manifest.js';
import type { MediaMetrics, ProbedFile } from '../../types/media.js';
import { classifyFilename } from '../scan/projectionClassifier.js';

export interface ManifestBuildOptions {
  rootDirectory: string;
  baseUrl: string;
}

/**
 * Percent-encode one path segment the way a URL path expects it: only
 * unreserved characters (A-Z a-z 0-9 - _ . ~) are left as they are.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * `baseUrl/relative/path`, with the path taken relative to the scanned root,
 * forward slashes on every platform, and each segment percent-encoded.
 */
export function buildVideoUrl(baseUrl: string, rootDirectory: string, filePath: string): string {
  const relativePath = path.relative(rootDirectory, filePath);
  const encoded = relativePath.split(path.sep).map(encodePathSegment).join('/');
  return `${baseUrl.replace(/\/+$/, '')}/${encoded}`;
}

/**
 * File name without its final extension
 */
export function fileStem(filePath: string): string {
  return path.parse(filePath).name;
}

export function buildScene(
  filePath: string,
  metrics: MediaMetrics,
  options: ManifestBuildOptions
): Scene {
  const { stereoMode, screenType } = classifyFilename(filePath);

  // Key order here is the key order in the written file
  return {
    title: fileStem(filePath),
    videoLength: metrics.durationSec,
    video_url: buildVideoUrl(options.baseUrl, options.rootDirectory, filePath),
    thumbnailUrl: MANIFEST.THUMBNAIL_URL,
    is3d: true,
    stereoMode,
    screenType,
  };
}

/**
 * One scene per file, in the order given, grouped into the single "Library"
 */
export function buildManifest(files: readonly ProbedFile[], options: ManifestBuildOptions): Manifest {
  const library: Library = {
    name: MANIFEST.LIBRARY_NAME,
    list: files.map(file => buildScene(file.filePath, file.metrics, options)),
  };

  return { scenes: [library] };
}
