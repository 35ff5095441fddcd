/**
 * Scene list consumed by DeoVR-compatible players
 * @see https://deovr.com/app/doc#multiple-videos-deeplink
 *
 * Key names and enum values are part of the player contract.
 */

export const STEREO_MODES = ['off', 'sbs', 'tb', 'cuv'] as const;
export type StereoMode = (typeof STEREO_MODES)[number];

export const SCREEN_TYPES = ['flat', 'dome', 'sphere', 'fisheye', 'rf52', 'mkx200'] as const;
export type ScreenType = (typeof SCREEN_TYPES)[number];

export interface VideoSource {
  resolution: number;
  url: string;
}

export interface Encoding {
  name: string;
  videoSources: VideoSource[];
}

export interface TimeStamp {
  ts: number; // seconds
  name: string;
}

export interface Scene {
  id?: number;
  title: string;
  videoLength: number; // seconds
  video_url: string;
  thumbnailUrl: string;
  is3d: true;
  stereoMode: StereoMode;
  screenType: ScreenType;
  encodings?: Encoding[];
  videoThumbnail?: string;
  videoPreview?: string;
  corrections?: Record<string, number>;
  timeStamps?: TimeStamp[];
  skipIntro?: number; // seconds
  path?: string; // images mode only
}

export interface Library {
  name: string;
  list: Scene[];
}

export interface Manifest {
  scenes: Library[];
}
