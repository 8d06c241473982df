/**
 * Timeline
 *
 * Ordered collection of stimulus events plus test metadata.
 *
 * Key invariants (hold after every public call returns):
 * - `events` is ascending by onset; equal onsets keep insertion order
 * - `metadata.durationMs` equals the latest event end, or 0 when empty
 *
 * The Timeline does not range-check what it is given; build events with the
 * factories in stimulusEvent.ts (or run validateStimulusEvent) first.
 */

import { parseSerializedTimeline } from '@/schemas/timelineFileSchemas';
import { nodeFileSystem, type FileSystem } from '@/services/fileSystem';
import { createLogger } from '@/services/logger';
import {
  DEFAULT_TEST_NAME,
  type EventId,
  type SerializedTimeline,
  type StimulusEvent,
  type StimulusEventChanges,
  type TimeMs,
  type TimelineMetadata,
} from '@/types';
import { FormatError } from './errors';
import { deserializeEvent, deserializeMetadata, serializeEvent, serializeMetadata } from './serialization';
import { applyEventChanges, getEventEndMs, isEventActiveAt } from './stimulusEvent';

const logger = createLogger('Timeline');

// =============================================================================
// Types
// =============================================================================

export interface TimelineOptions {
  /** Storage used by save/load (defaults to node:fs) */
  fileSystem?: FileSystem;
  metadata?: Partial<Pick<TimelineMetadata, 'name' | 'description'>>;
}

// =============================================================================
// Timeline Class
// =============================================================================

export class Timeline {
  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private _events: StimulusEvent[] = [];
  /** Insertion sequence per event id, breaks onset ties */
  private readonly _sequence = new Map<EventId, number>();
  private _nextSequence: number = 0;

  private _name: string;
  private _description: string;
  private _durationMs: TimeMs = 0;
  /** Metadata keys from a loaded file that this version does not interpret */
  private _metadataExtras: Record<string, unknown> = {};

  private readonly _fileSystem: FileSystem;

  constructor(options: TimelineOptions = {}) {
    this._fileSystem = options.fileSystem ?? nodeFileSystem;
    this._name = options.metadata?.name ?? DEFAULT_TEST_NAME;
    this._description = options.metadata?.description ?? '';
  }

  // ---------------------------------------------------------------------------
  // Getters
  // ---------------------------------------------------------------------------

  /** Events in timeline order. Do not mutate; use updateEvent. */
  get events(): readonly StimulusEvent[] {
    return this._events;
  }

  get metadata(): TimelineMetadata {
    return {
      name: this._name,
      description: this._description,
      durationMs: this._durationMs,
    };
  }

  get durationMs(): TimeMs {
    return this._durationMs;
  }

  get size(): number {
    return this._events.length;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Insert an event. Overlaps and identical onsets are allowed.
   *
   * @returns false when an event with the same id is already present
   */
  addEvent(event: StimulusEvent): boolean {
    if (this._sequence.has(event.id)) {
      logger.debug('Ignoring duplicate event', { eventId: event.id });
      return false;
    }

    this._sequence.set(event.id, this._nextSequence++);
    this._events.push(event);
    this._reindex();
    logger.debug('Event added', { eventId: event.id, kind: event.kind, onsetMs: event.onsetMs });
    return true;
  }

  /**
   * Remove an event by identity.
   *
   * @returns whether an event was removed
   */
  removeEvent(eventOrId: StimulusEvent | EventId): boolean {
    const id = typeof eventOrId === 'string' ? eventOrId : eventOrId.id;
    const index = this._events.findIndex((event) => event.id === id);
    if (index === -1) {
      return false;
    }

    this._events.splice(index, 1);
    this._sequence.delete(id);
    this._recomputeDuration();
    logger.debug('Event removed', { eventId: id });
    return true;
  }

  /**
   * Edit an event's timing or payload in place. The event keeps its id and
   * kind; the order and duration are re-established afterwards.
   *
   * @returns the updated event, or undefined for an unknown id
   */
  updateEvent(id: EventId, changes: StimulusEventChanges): StimulusEvent | undefined {
    const event = this.getEventById(id);
    if (!event) {
      return undefined;
    }

    applyEventChanges(event, changes);
    this._reindex();
    return event;
  }

  setMetadata(changes: Partial<Pick<TimelineMetadata, 'name' | 'description'>>): void {
    if (changes.name !== undefined) {
      this._name = changes.name;
    }
    if (changes.description !== undefined) {
      this._description = changes.description;
    }
  }

  /** Remove every event; metadata name and description are kept */
  clear(): void {
    this._events = [];
    this._sequence.clear();
    this._durationMs = 0;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getEventById(id: EventId): StimulusEvent | undefined {
    return this._events.find((event) => event.id === id);
  }

  /**
   * Events active at `timeMs`, in timeline order. Boundaries are inclusive:
   * an event at 1000 lasting 2000 is active at 1000 and at 3000.
   */
  getEventsAtTime(timeMs: TimeMs, toleranceMs: TimeMs = 0): StimulusEvent[] {
    return this._events.filter((event) => isEventActiveAt(event, timeMs, toleranceMs));
  }

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------

  toSerializable(): SerializedTimeline {
    return {
      metadata: serializeMetadata(this.metadata, this._metadataExtras),
      events: this._events.map(serializeEvent),
    };
  }

  /**
   * Build a timeline from native-format data.
   *
   * @throws FormatError when the structure is malformed; nothing partial is returned
   */
  static fromSerializable(data: unknown, options: Omit<TimelineOptions, 'metadata'> = {}): Timeline {
    const parsed = parseSerializedTimeline(data);
    if (!parsed.success) {
      throw new FormatError(parsed.issues);
    }

    const { name, description, extras } = deserializeMetadata(parsed.data.metadata);
    const timeline = new Timeline({ ...options, metadata: { name, description } });
    timeline._metadataExtras = extras;

    for (const event of parsed.data.events ?? []) {
      timeline.addEvent(deserializeEvent(event));
    }
    return timeline;
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Write the native JSON file (UTF-8, 2-space indent)
   *
   * @throws TimelineIOError when the file cannot be written
   */
  save(path: string): void {
    const content = `${JSON.stringify(this.toSerializable(), null, 2)}\n`;
    this._fileSystem.writeTextFile(path, content);
    logger.info('Test saved', { path, events: this._events.length });
  }

  /**
   * Read a native JSON file
   *
   * @throws TimelineIOError when the file cannot be read
   * @throws FormatError when it is not valid JSON or not a timeline
   */
  static load(path: string, options: Omit<TimelineOptions, 'metadata'> = {}): Timeline {
    const fileSystem = options.fileSystem ?? nodeFileSystem;
    const content = fileSystem.readTextFile(path);

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FormatError([{ path: '', message: `Invalid JSON: ${reason}` }], { cause: error });
    }

    const timeline = Timeline.fromSerializable(raw, { fileSystem });
    logger.info('Test loaded', { path, events: timeline.size });
    return timeline;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private _reindex(): void {
    this._events.sort(
      (a, b) => a.onsetMs - b.onsetMs || this._sequenceOf(a.id) - this._sequenceOf(b.id)
    );
    this._recomputeDuration();
  }

  private _sequenceOf(id: EventId): number {
    return this._sequence.get(id) ?? 0;
  }

  private _recomputeDuration(): void {
    this._durationMs = this._events.reduce((latest, event) => Math.max(latest, getEventEndMs(event)), 0);
  }
}
