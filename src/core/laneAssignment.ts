/**
 * Lane Assignment
 *
 * Greedy interval partitioning for the visual timeline: events are taken in
 * onset order and dropped into the first lane that is free, opening a new
 * lane only when every existing one is still busy. Processing in onset order
 * makes the lane count equal to the peak number of concurrent events.
 *
 * Intervals that only touch (one ends exactly where the next begins) share a
 * lane.
 */

import type { EventId, Lane, TimedInterval } from '@/types';

/**
 * Partition items into the fewest lanes with no overlap inside a lane.
 *
 * The input is not modified. Items with equal onsets keep their input order,
 * so the layout is deterministic.
 *
 * @example
 * ```ts
 * const lanes = assignLanes(timeline.events);
 * lanes.forEach((lane) => drawRow(lane.index, lane.events));
 * ```
 */
export function assignLanes<T extends TimedInterval>(items: readonly T[]): Lane<T>[] {
  // Array.prototype.sort is stable, so ties stay in input order
  const ordered = [...items].sort((a, b) => a.onsetMs - b.onsetMs);
  const lanes: Lane<T>[] = [];

  for (const item of ordered) {
    const end = item.onsetMs + item.durationMs;
    const lane = lanes.find((candidate) => candidate.freeAtMs <= item.onsetMs);

    if (lane) {
      lane.events.push(item);
      lane.freeAtMs = end;
    } else {
      lanes.push({ index: lanes.length, events: [item], freeAtMs: end });
    }
  }

  return lanes;
}

/**
 * Peak number of intervals overlapping at one instant. An interval ending at
 * `t` and another starting at `t` do not count as concurrent.
 */
export function maxConcurrentEvents(items: readonly TimedInterval[]): number {
  const edges: Array<{ at: number; delta: 1 | -1 }> = [];
  for (const item of items) {
    edges.push({ at: item.onsetMs, delta: 1 });
    edges.push({ at: item.onsetMs + item.durationMs, delta: -1 });
  }
  // ends before starts at the same instant
  edges.sort((a, b) => a.at - b.at || a.delta - b.delta);

  let active = 0;
  let peak = 0;
  for (const edge of edges) {
    active += edge.delta;
    peak = Math.max(peak, active);
  }
  return peak;
}

/**
 * Lookup from event id to lane index, for highlighting and hit-testing
 */
export function getLaneIndexById<T extends TimedInterval & { id: EventId }>(
  lanes: readonly Lane<T>[]
): Map<EventId, number> {
  const index = new Map<EventId, number>();
  for (const lane of lanes) {
    for (const event of lane.events) {
      index.set(event.id, lane.index);
    }
  }
  return index;
}
