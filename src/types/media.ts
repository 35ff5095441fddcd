/**
 * Container-level figures reported by a MetadataProbe.
 * Zero means the probe found nothing usable; it is not an error.
 */
export interface MediaMetrics {
  sizeMB: number;
  durationSec: number;
}

/**
 * A threshold of 0 disables that check.
 */
export interface FilterThresholds {
  minSizeMB: number;
  minDurationSec: number;
}

/**
 * A discovered file that survived filtering, with the metrics it was judged on
 */
export interface ProbedFile {
  filePath: string;
  metrics: MediaMetrics;
}
