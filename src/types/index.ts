/**
 * Stimulus Timeline Type Definitions
 *
 * Domain types for stimulus events, timelines and their on-disk form.
 * In-memory types use camelCase; the serialized types mirror the native JSON
 * file format key for key.
 */

// =============================================================================
// ID Types
// =============================================================================

/** Stimulus event unique identifier (UUID, never serialized) */
export type EventId = string;

// =============================================================================
// Time Types
// =============================================================================

/** Time in integer milliseconds from test start */
export type TimeMs = number;

// =============================================================================
// Stimulus Types
// =============================================================================

/** Stimulus modality */
export type StimulusKind = 'image' | 'audio';

/** All stimulus kinds in display order */
export const STIMULUS_KINDS: readonly StimulusKind[] = ['image', 'audio'] as const;

/** Screen anchor for image stimuli */
export type ImagePosition = 'center' | 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

export const IMAGE_POSITIONS: readonly ImagePosition[] = [
  'center',
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
] as const;

/** Marker code written to analysis files when an event has none */
export const DEFAULT_MARKER_CODE = 1;

export const MIN_MARKER_CODE = 1;
export const MAX_MARKER_CODE = 255;

export interface ImagePayload {
  filePath: string;
  position: ImagePosition;
  /** Trigger code (1-255); absent means {@link DEFAULT_MARKER_CODE} */
  markerCode?: number;
}

export interface AudioPayload {
  filePath: string;
  /** Playback gain, 0.0 to 1.0 inclusive */
  volume: number;
  /** Trigger code (1-255); absent means {@link DEFAULT_MARKER_CODE} */
  markerCode?: number;
}

/** Unrecognized payload keys carried through load/save untouched */
export type PayloadExtensions = Record<string, unknown>;

interface StimulusEventBase {
  /** Stable identity for lookup, removal and highlighting */
  readonly id: EventId;
  /** Milliseconds from test start (>= 0) */
  onsetMs: TimeMs;
  /** Presentation length in milliseconds (> 0) */
  durationMs: TimeMs;
  extensions: PayloadExtensions;
}

export interface ImageStimulusEvent extends StimulusEventBase {
  readonly kind: 'image';
  payload: ImagePayload;
}

export interface AudioStimulusEvent extends StimulusEventBase {
  readonly kind: 'audio';
  payload: AudioPayload;
}

/** One scheduled stimulus occurrence */
export type StimulusEvent = ImageStimulusEvent | AudioStimulusEvent;

/** Editable fields of an event; identity and kind never change */
export type StimulusEventChanges<E extends StimulusEvent = StimulusEvent> = Partial<
  Pick<E, 'onsetMs' | 'durationMs'>
> & {
  payload?: Partial<E['payload']>;
};

// =============================================================================
// Timeline Types
// =============================================================================

export interface TimelineMetadata {
  name: string;
  description: string;
  /** End of the last event, recomputed after every mutation */
  durationMs: TimeMs;
}

/** Default test name for a fresh timeline */
export const DEFAULT_TEST_NAME = 'Untitled Test';

/** Anything with a time span; lane layout works on this shape */
export interface TimedInterval {
  onsetMs: TimeMs;
  durationMs: TimeMs;
}

/** One row of a lane layout */
export interface Lane<T extends TimedInterval = StimulusEvent> {
  /** Zero-based lane index in creation order */
  index: number;
  /** Events placed in this lane, ascending by onset */
  events: T[];
  /** End time of the last event placed in this lane */
  freeAtMs: TimeMs;
}

// =============================================================================
// Serialized (Native JSON) Types
// =============================================================================

/** `data` object of a serialized event */
export interface SerializedEventData {
  file_path?: string;
  duration_ms?: number;
  position?: string;
  volume?: number;
  marker_code?: number;
  [key: string]: unknown;
}

export interface SerializedEvent {
  event_type: string;
  timestamp_ms: number;
  data: SerializedEventData;
}

export interface SerializedMetadata {
  name: string;
  description: string;
  duration_ms: number;
  [key: string]: unknown;
}

/** Canonical structured form of a timeline (the native file format) */
export interface SerializedTimeline {
  metadata: SerializedMetadata;
  events: SerializedEvent[];
}
