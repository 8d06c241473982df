/**
 * Timeline Utility Functions
 *
 * Time to pixel (or column) conversion for drawn timelines.
 * All times are integer milliseconds.
 */

import type { TimeMs } from '@/types';

/**
 * Timeline scale configuration for time/pixel conversions
 */
export interface TimelineScale {
  /** Pixels per second */
  zoom: number;
}

/**
 * Converts a timeline time to a pixel position
 *
 * @returns Pixel position, or 0 if inputs are invalid
 *
 * @example
 * ```ts
 * timeToPixel(5000, { zoom: 100 }); // 500
 * ```
 */
export function timeToPixel(timeMs: TimeMs, scale: TimelineScale): number {
  if (!Number.isFinite(timeMs) || !Number.isFinite(scale.zoom)) {
    return 0;
  }
  return (timeMs / 1000) * scale.zoom;
}
