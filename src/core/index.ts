/**
 * Core Module Index
 *
 * Exports the timeline model, lane layout and error classes.
 */

export { Timeline, type TimelineOptions } from './Timeline';
export {
  createEventId,
  createStimulusEvent,
  createImageEvent,
  createAudioEvent,
  getEventEndMs,
  getMarkerCode,
  isEventActiveAt,
  applyEventChanges,
} from './stimulusEvent';
export { assignLanes, maxConcurrentEvents, getLaneIndexById } from './laneAssignment';
export {
  DEFAULT_VOLUME,
  serializeEvent,
  deserializeEvent,
  serializeMetadata,
  deserializeMetadata,
} from './serialization';
export {
  TimelineError,
  ValidationError,
  FormatError,
  UnsupportedFormatError,
  TimelineIOError,
  isTimelineError,
  type ErrorIssue,
  type IOOperation,
} from './errors';
