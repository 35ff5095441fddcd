import type { FilterThresholds, MediaMetrics } from '../../types/media.js';

/**
 * Filter Policy
 *
 * A file is dropped when it is below EITHER threshold. Metrics are never
 * negative, so a threshold of 0 can never exclude anything.
 */

export type FilterReason = 'size' | 'duration';

export interface FilterDecision {
  excluded: boolean;
  reasons: FilterReason[];
}

export function evaluateFilter(metrics: MediaMetrics, thresholds: FilterThresholds): FilterDecision {
  const reasons: FilterReason[] = [];

  if (metrics.sizeMB < thresholds.minSizeMB) {
    reasons.push('size');
  }
  if (metrics.durationSec < thresholds.minDurationSec) {
    reasons.push('duration');
  }

  return { excluded: reasons.length > 0, reasons };
}

export function isExcluded(metrics: MediaMetrics, thresholds: FilterThresholds): boolean {
  return evaluateFilter(metrics, thresholds).excluded;
}
