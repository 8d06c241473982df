/**
 * Timeline Store
 *
 * Editor-facing state around one Timeline: selection, the file it came from
 * and whether it has unsaved changes. Uses Zustand with Immer for state
 * updates.
 *
 * The Timeline instance is mutated in place by its own methods and is not
 * drafted by Immer; every mutation bumps `revision` so subscribers can tell
 * that the events changed.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { ValidationError } from '@/core/errors';
import { assignLanes } from '@/core/laneAssignment';
import { createStimulusEvent } from '@/core/stimulusEvent';
import { Timeline } from '@/core/Timeline';
import { exportTimeline } from '@/export/exportTimeline';
import type { ExportFormat } from '@/export/formats';
import { assertValidStimulusEvent, type StimulusInput } from '@/schemas/stimulusSchemas';
import { nodeFileSystem, type FileSystem } from '@/services/fileSystem';
import { createLogger } from '@/services/logger';
import { addRecentTest, type RecentTestsOptions } from '@/services/recentTests';
import type {
  EventId,
  Lane,
  PayloadExtensions,
  StimulusEvent,
  StimulusEventChanges,
  TimeMs,
  TimelineMetadata,
} from '@/types';

const logger = createLogger('TimelineStore');

// =============================================================================
// Types
// =============================================================================

export interface TimelineStoreState {
  timeline: Timeline;
  /** Incremented on every change to the timeline's events or metadata */
  revision: number;
  selectedEventIds: EventId[];
  /** Where the test was last loaded from or saved to */
  filePath: string | null;
  isDirty: boolean;

  // Actions - Events
  /** @throws ValidationError when the input is out of range */
  addEvent: (input: StimulusInput, extensions?: PayloadExtensions) => StimulusEvent;
  removeEvent: (id: EventId) => boolean;
  /** @returns number of events removed */
  removeSelected: () => number;
  /** @throws ValidationError when the edited event would be out of range */
  updateEvent: (id: EventId, changes: StimulusEventChanges) => StimulusEvent | undefined;
  setMetadata: (changes: Partial<Pick<TimelineMetadata, 'name' | 'description'>>) => void;

  // Actions - Selection
  selectEvent: (id: EventId, addToSelection?: boolean) => void;
  deselectEvent: (id: EventId) => void;
  clearSelection: () => void;
  isEventSelected: (id: EventId) => boolean;

  // Actions - Files
  newTest: (metadata?: Partial<Pick<TimelineMetadata, 'name' | 'description'>>) => void;
  /** @throws TimelineIOError | FormatError */
  loadTest: (path: string) => void;
  /** @throws TimelineIOError */
  saveTest: (path?: string) => string;
  /** @throws UnsupportedFormatError | TimelineIOError */
  exportTest: (path: string, format?: string) => ExportFormat;

  // Queries
  getLanes: () => Lane[];
  getActiveEvents: (timeMs: TimeMs, toleranceMs?: TimeMs) => StimulusEvent[];
}

export interface TimelineStoreOptions {
  fileSystem?: FileSystem;
  /** Recent tests list settings; `false` disables tracking */
  recentTests?: Omit<RecentTestsOptions, 'fileSystem'> | false;
}

// =============================================================================
// Store
// =============================================================================

export function createTimelineStore(options: TimelineStoreOptions = {}) {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const recentTests = options.recentTests ?? {};

  const rememberTest = (path: string): void => {
    if (recentTests !== false) {
      addRecentTest(path, { ...recentTests, fileSystem });
    }
  };

  return createStore<TimelineStoreState>()(
    immer((set, get) => {
      const markChanged = (): void => {
        set((state) => {
          state.revision += 1;
          state.isDirty = true;
        });
      };

      return {
        timeline: new Timeline({ fileSystem }),
        revision: 0,
        selectedEventIds: [],
        filePath: null,
        isDirty: false,

        // =====================================================================
        // Events
        // =====================================================================

        addEvent: (input, extensions = {}) => {
          const event = createStimulusEvent(input, extensions);
          get().timeline.addEvent(event);
          markChanged();
          return event;
        },

        removeEvent: (id) => {
          const removed = get().timeline.removeEvent(id);
          if (removed) {
            set((state) => {
              state.selectedEventIds = state.selectedEventIds.filter((selected) => selected !== id);
            });
            markChanged();
          }
          return removed;
        },

        removeSelected: () => {
          const { timeline, selectedEventIds } = get();
          const removed = selectedEventIds.filter((id) => timeline.removeEvent(id)).length;
          set((state) => {
            state.selectedEventIds = [];
          });
          if (removed > 0) {
            markChanged();
          }
          return removed;
        },

        updateEvent: (id, changes) => {
          const { timeline } = get();
          const current = timeline.getEventById(id);
          if (!current) {
            return undefined;
          }

          // Validate the edited event before touching the timeline
          assertValidStimulusEvent({
            kind: current.kind,
            onsetMs: changes.onsetMs ?? current.onsetMs,
            durationMs: changes.durationMs ?? current.durationMs,
            payload: { ...current.payload, ...changes.payload },
          });

          const updated = timeline.updateEvent(id, changes);
          markChanged();
          return updated;
        },

        setMetadata: (changes) => {
          get().timeline.setMetadata(changes);
          markChanged();
        },

        // =====================================================================
        // Selection
        // =====================================================================

        selectEvent: (id, addToSelection = false) => {
          set((state) => {
            if (addToSelection) {
              if (!state.selectedEventIds.includes(id)) {
                state.selectedEventIds = [...state.selectedEventIds, id];
              }
            } else {
              state.selectedEventIds = [id];
            }
          });
        },

        deselectEvent: (id) => {
          set((state) => {
            state.selectedEventIds = state.selectedEventIds.filter((selected) => selected !== id);
          });
        },

        clearSelection: () => {
          set((state) => {
            state.selectedEventIds = [];
          });
        },

        isEventSelected: (id) => get().selectedEventIds.includes(id),

        // =====================================================================
        // Files
        // =====================================================================

        newTest: (metadata) => {
          set({
            timeline: new Timeline({ fileSystem, metadata }),
            revision: get().revision + 1,
            selectedEventIds: [],
            filePath: null,
            isDirty: false,
          });
        },

        loadTest: (path) => {
          // Load completes before any state changes; a failure leaves the store untouched
          const timeline = Timeline.load(path, { fileSystem });
          set({
            timeline,
            revision: get().revision + 1,
            selectedEventIds: [],
            filePath: path,
            isDirty: false,
          });
          rememberTest(path);
        },

        saveTest: (path) => {
          const target = path ?? get().filePath;
          if (target === null) {
            throw new ValidationError([{ path: 'filePath', message: 'Choose where to save the test' }], 'test');
          }

          get().timeline.save(target);
          set((state) => {
            state.filePath = target;
            state.isDirty = false;
          });
          rememberTest(target);
          return target;
        },

        exportTest: (path, format) => {
          const written = exportTimeline(get().timeline.toSerializable(), path, format, { fileSystem });
          logger.debug('Exported from store', { path, format: written });
          return written;
        },

        // =====================================================================
        // Queries
        // =====================================================================

        getLanes: () => assignLanes(get().timeline.events),

        getActiveEvents: (timeMs, toleranceMs = 0) => get().timeline.getEventsAtTime(timeMs, toleranceMs),
      };
    })
  );
}

export type TimelineStore = ReturnType<typeof createTimelineStore>;
