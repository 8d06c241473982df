/**
 * Native Format Serialization
 *
 * Maps between in-memory events/metadata and the native JSON structure
 * (`event_type`, `timestamp_ms`, `data`). Reading goes through the
 * structural schemas; payload keys this version does not know are kept in
 * `extensions` and written back unchanged. A `data` key named `__proto__`
 * does not survive schema parsing and is not kept.
 */

import type { ParsedSerializedEvent } from '@/schemas/timelineFileSchemas';
import { KNOWN_DATA_KEYS } from '@/schemas/timelineFileSchemas';
import {
  DEFAULT_TEST_NAME,
  type PayloadExtensions,
  type SerializedEvent,
  type SerializedEventData,
  type SerializedMetadata,
  type StimulusEvent,
  type StimulusKind,
  type TimelineMetadata,
} from '@/types';
import { createEventId } from './stimulusEvent';

/** Volume assumed for audio events saved without one */
export const DEFAULT_VOLUME = 1;

// =============================================================================
// Events
// =============================================================================

export function serializeEvent(event: StimulusEvent): SerializedEvent {
  const data: SerializedEventData = {
    file_path: event.payload.filePath,
    duration_ms: event.durationMs,
  };

  if (event.kind === 'image') {
    data.position = event.payload.position;
  } else {
    data.volume = event.payload.volume;
  }
  if (event.payload.markerCode !== undefined) {
    data.marker_code = event.payload.markerCode;
  }

  const known = KNOWN_DATA_KEYS[event.kind];
  for (const [key, value] of Object.entries(event.extensions)) {
    if (!known.includes(key)) {
      data[key] = value;
    }
  }

  return {
    event_type: event.kind,
    timestamp_ms: event.onsetMs,
    data,
  };
}

function pickExtensions(kind: StimulusKind, data: Record<string, unknown>): PayloadExtensions {
  const known = KNOWN_DATA_KEYS[kind];
  return Object.fromEntries(Object.entries(data).filter(([key]) => !known.includes(key)));
}

/**
 * Build an event (with a fresh id) from structurally valid data.
 * The schema guarantees one of `file_path` / `filepath` is present.
 */
export function deserializeEvent(parsed: ParsedSerializedEvent): StimulusEvent {
  const { data } = parsed;
  const filePath = data.file_path ?? data.filepath ?? '';
  const markerCode = data.marker_code;

  if (parsed.event_type === 'image') {
    return {
      id: createEventId(),
      kind: 'image',
      onsetMs: parsed.timestamp_ms,
      durationMs: data.duration_ms,
      payload: {
        filePath,
        position: parsed.data.position ?? 'center',
        ...(markerCode !== undefined && { markerCode }),
      },
      extensions: pickExtensions('image', data),
    };
  }

  return {
    id: createEventId(),
    kind: 'audio',
    onsetMs: parsed.timestamp_ms,
    durationMs: data.duration_ms,
    payload: {
      filePath,
      volume: parsed.data.volume ?? DEFAULT_VOLUME,
      ...(markerCode !== undefined && { markerCode }),
    },
    extensions: pickExtensions('audio', data),
  };
}

// =============================================================================
// Metadata
// =============================================================================

export function serializeMetadata(
  metadata: TimelineMetadata,
  extras: Record<string, unknown>
): SerializedMetadata {
  return {
    ...extras,
    name: metadata.name,
    description: metadata.description,
    duration_ms: metadata.durationMs,
  };
}

/**
 * Split loaded metadata into known fields and pass-through extras.
 * `duration_ms` is dropped: it is derived from the events.
 */
export function deserializeMetadata(raw: Record<string, unknown> | undefined): {
  name: string;
  description: string;
  extras: Record<string, unknown>;
} {
  const extras: Record<string, unknown> = { ...raw };
  const { name, description } = extras;
  delete extras.name;
  delete extras.description;
  delete extras.duration_ms;
  return {
    name: typeof name === 'string' ? name : DEFAULT_TEST_NAME,
    description: typeof description === 'string' ? description : '',
    extras,
  };
}
