/**
 * Text Timeline Rendering
 *
 * Fixed-width bar chart of a timeline for terminals and log output.
 */

import { getEventEndMs } from '@/core/stimulusEvent';
import type { StimulusEvent, TimeMs } from '@/types';
import { getBasename } from './stimulusPath';
import { timeToPixel, type TimelineScale } from './timeline';

export interface TimelineTextOptions {
  /** Columns spanning 0 to the timeline duration */
  width?: number;
  barChar?: string;
}

const DEFAULT_WIDTH = 60;

const KIND_SYMBOLS: Record<StimulusEvent['kind'], string> = {
  image: 'IMG',
  audio: 'AUD',
};

/**
 * Render one bar per event, scaled so `durationMs` fills `width` columns.
 * Every event gets at least one column.
 *
 * @example
 * ```
 * Timeline (0ms to 4000ms):
 * ==============================================================
 * IMG ###############                                                image: cross.png
 *     0ms -> 1000ms
 * ```
 */
export function renderTimelineText(
  events: readonly StimulusEvent[],
  durationMs: TimeMs,
  options: TimelineTextOptions = {}
): string[] {
  if (events.length === 0 || durationMs <= 0) {
    return ['Timeline is empty'];
  }

  const width = options.width ?? DEFAULT_WIDTH;
  const barChar = options.barChar ?? '#';
  const columns = width + 2;
  const scale: TimelineScale = { zoom: (width * 1000) / durationMs };
  const rule = '='.repeat(columns);

  const lines = [`Timeline (0ms to ${durationMs}ms):`, rule];

  for (const event of events) {
    const start = Math.floor(timeToPixel(event.onsetMs, scale));
    const length = Math.max(1, Math.floor(timeToPixel(event.durationMs, scale)));
    const end = Math.min(start + length, columns);
    const bar = ' '.repeat(start) + barChar.repeat(Math.max(0, end - start)) + ' '.repeat(columns - Math.max(end, start));

    lines.push(`${KIND_SYMBOLS[event.kind]} ${bar} ${event.kind}: ${getBasename(event.payload.filePath)}`);
    lines.push(`    ${event.onsetMs}ms -> ${getEventEndMs(event)}ms`);
  }

  lines.push(rule);
  return lines;
}
