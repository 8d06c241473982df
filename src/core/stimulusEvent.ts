/**
 * Stimulus Events
 *
 * Construction and small helpers for StimulusEvent values. Factories run
 * the range validator first, so an event built here is always valid; the
 * Timeline does not re-check what it is given.
 */

import { randomUUID } from 'node:crypto';
import {
  assertValidStimulusEvent,
  type AudioStimulusInput,
  type ImageStimulusInput,
  type StimulusInput,
} from '@/schemas/stimulusSchemas';
import { KNOWN_DATA_KEYS } from '@/schemas/timelineFileSchemas';
import {
  DEFAULT_MARKER_CODE,
  type AudioStimulusEvent,
  type EventId,
  type ImageStimulusEvent,
  type PayloadExtensions,
  type StimulusEvent,
  type StimulusEventChanges,
  type StimulusKind,
  type TimeMs,
} from '@/types';
import { ValidationError, type ErrorIssue } from './errors';

// =============================================================================
// Identity
// =============================================================================

/**
 * Generate a new event identifier
 */
export function createEventId(): EventId {
  return randomUUID();
}

// =============================================================================
// Factories
// =============================================================================

/** JSON.parse keeps it, but object schemas drop it on load */
const UNSTORABLE_EXTENSION_KEYS: readonly string[] = ['__proto__'];

/**
 * Extensions sit next to the payload in the file, so they may not reuse a
 * payload field's name.
 */
function checkExtensionKeys(kind: StimulusKind, extensions: PayloadExtensions): void {
  const known = KNOWN_DATA_KEYS[kind];
  const issues: ErrorIssue[] = [];
  for (const key of Object.keys(extensions)) {
    if (known.includes(key)) {
      issues.push({ path: `extensions.${key}`, message: `"${key}" is a payload field of ${kind} events` });
    } else if (UNSTORABLE_EXTENSION_KEYS.includes(key)) {
      issues.push({ path: `extensions.${key}`, message: `"${key}" cannot be stored` });
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}

/**
 * Validate editor input and build a new event with a fresh id.
 *
 * @throws ValidationError when any field is out of range, or an extension
 *   reuses a payload field's name
 */
export function createStimulusEvent(input: StimulusInput, extensions: PayloadExtensions = {}): StimulusEvent {
  const valid = assertValidStimulusEvent(input);
  checkExtensionKeys(valid.kind, extensions);
  const id = createEventId();

  if (valid.kind === 'image') {
    return {
      id,
      kind: 'image',
      onsetMs: valid.onsetMs,
      durationMs: valid.durationMs,
      payload: valid.payload,
      extensions: { ...extensions },
    };
  }

  return {
    id,
    kind: 'audio',
    onsetMs: valid.onsetMs,
    durationMs: valid.durationMs,
    payload: valid.payload,
    extensions: { ...extensions },
  };
}

export function createImageEvent(input: Omit<ImageStimulusInput, 'kind'>): ImageStimulusEvent {
  const event = createStimulusEvent({ ...input, kind: 'image' });
  if (event.kind !== 'image') {
    throw new Error('createStimulusEvent returned a non-image event');
  }
  return event;
}

export function createAudioEvent(input: Omit<AudioStimulusInput, 'kind'>): AudioStimulusEvent {
  const event = createStimulusEvent({ ...input, kind: 'audio' });
  if (event.kind !== 'audio') {
    throw new Error('createStimulusEvent returned a non-audio event');
  }
  return event;
}

// =============================================================================
// Queries
// =============================================================================

/** End instant of an event (onset + duration) */
export function getEventEndMs(event: { onsetMs: TimeMs; durationMs: TimeMs }): TimeMs {
  return event.onsetMs + event.durationMs;
}

/** Marker code written to analysis files */
export function getMarkerCode(event: StimulusEvent): number {
  return event.payload.markerCode ?? DEFAULT_MARKER_CODE;
}

/**
 * Whether an event is active at `timeMs`. Both boundaries are inclusive:
 * an event is active at its onset and at its end instant.
 */
export function isEventActiveAt(event: StimulusEvent, timeMs: TimeMs, toleranceMs: TimeMs = 0): boolean {
  return event.onsetMs - toleranceMs <= timeMs && timeMs <= getEventEndMs(event) + toleranceMs;
}

// =============================================================================
// Mutation
// =============================================================================

/**
 * Apply edits in place. Identity and kind are untouched; payload fields not
 * mentioned keep their values.
 */
export function applyEventChanges(event: StimulusEvent, changes: StimulusEventChanges): void {
  if (changes.onsetMs !== undefined) {
    event.onsetMs = changes.onsetMs;
  }
  if (changes.durationMs !== undefined) {
    event.durationMs = changes.durationMs;
  }
  if (changes.payload === undefined) {
    return;
  }

  if (event.kind === 'image') {
    const { filePath, markerCode } = changes.payload;
    const position = 'position' in changes.payload ? changes.payload.position : undefined;
    event.payload = {
      ...event.payload,
      ...(filePath !== undefined && { filePath }),
      ...(markerCode !== undefined && { markerCode }),
      ...(position !== undefined && { position }),
    };
  } else {
    const { filePath, markerCode } = changes.payload;
    const volume = 'volume' in changes.payload ? changes.payload.volume : undefined;
    event.payload = {
      ...event.payload,
      ...(filePath !== undefined && { filePath }),
      ...(markerCode !== undefined && { markerCode }),
      ...(volume !== undefined && { volume }),
    };
  }
}
