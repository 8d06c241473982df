/**
 * Timeline Tests
 *
 * Covers ordering, duration bookkeeping, active-event queries,
 * serialization and file persistence through an in-memory file system.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryFileSystem } from '@/services/memoryFileSystem';
import type { StimulusEvent } from '@/types';
import { FormatError, TimelineIOError } from './errors';
import { createAudioEvent, createImageEvent } from './stimulusEvent';
import { Timeline } from './Timeline';

// =============================================================================
// Fixtures
// =============================================================================

function image(onsetMs: number, durationMs: number, filePath = 'img.png'): StimulusEvent {
  return createImageEvent({ onsetMs, durationMs, payload: { filePath } });
}

function audio(onsetMs: number, durationMs: number, filePath = 'snd.wav'): StimulusEvent {
  return createAudioEvent({ onsetMs, durationMs, payload: { filePath, volume: 0.8 } });
}

function fileNames(events: readonly StimulusEvent[]): string[] {
  return events.map((event) => event.payload.filePath);
}

/** Fixation, cue, target with a synchronized tone, then a distractor */
function buildAttentionTest(): Timeline {
  const timeline = new Timeline({ metadata: { name: 'Attention Test', description: 'Multi-modal' } });
  timeline.addEvent(image(0, 500, 'fixation_cross.png'));
  timeline.addEvent(audio(500, 200, 'beep.wav'));
  timeline.addEvent(image(1000, 2000, 'target.png'));
  timeline.addEvent(audio(1000, 1000, 'tone.wav'));
  timeline.addEvent(image(2500, 1000, 'distractor.png'));
  return timeline;
}

// =============================================================================
// Tests
// =============================================================================

describe('Timeline', () => {
  describe('initial state', () => {
    it('should start empty with default metadata', () => {
      const timeline = new Timeline();

      expect(timeline.events).toEqual([]);
      expect(timeline.metadata).toEqual({ name: 'Untitled Test', description: '', durationMs: 0 });
    });
  });

  describe('addEvent', () => {
    it('should keep events sorted by onset', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(2000, 100, 'c.png'));
      timeline.addEvent(image(0, 100, 'a.png'));
      timeline.addEvent(audio(1000, 100, 'b.wav'));

      expect(fileNames(timeline.events)).toEqual(['a.png', 'b.wav', 'c.png']);
    });

    it('should keep insertion order for equal onsets', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(500, 100, 'first.png'));
      timeline.addEvent(audio(500, 300, 'second.wav'));
      timeline.addEvent(image(0, 100, 'early.png'));
      timeline.addEvent(image(500, 50, 'third.png'));

      expect(fileNames(timeline.events)).toEqual(['early.png', 'first.png', 'second.wav', 'third.png']);
    });

    it('should update the duration to the latest end', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(0, 5000));
      timeline.addEvent(audio(1000, 500));

      expect(timeline.durationMs).toBe(5000);
    });

    it('should allow overlapping and identical events', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(0, 1000));
      timeline.addEvent(image(0, 1000));

      expect(timeline.size).toBe(2);
    });

    it('should ignore an event that is already present', () => {
      const timeline = new Timeline();
      const event = image(0, 100);

      expect(timeline.addEvent(event)).toBe(true);
      expect(timeline.addEvent(event)).toBe(false);
      expect(timeline.size).toBe(1);
    });
  });

  describe('removeEvent', () => {
    it('should remove by event or id and recompute the duration', () => {
      const timeline = new Timeline();
      const short = image(0, 1000);
      const long = audio(500, 4000);
      timeline.addEvent(short);
      timeline.addEvent(long);

      expect(timeline.removeEvent(long.id)).toBe(true);
      expect(timeline.durationMs).toBe(1000);

      expect(timeline.removeEvent(short)).toBe(true);
      expect(timeline.durationMs).toBe(0);
    });

    it('should be a no-op for an unknown event', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(0, 1000));

      expect(timeline.removeEvent('missing')).toBe(false);
      expect(timeline.size).toBe(1);
    });

    it('should allow re-adding a removed event', () => {
      const timeline = new Timeline();
      const event = image(0, 100);
      timeline.addEvent(event);
      timeline.removeEvent(event);

      expect(timeline.addEvent(event)).toBe(true);
    });
  });

  describe('updateEvent', () => {
    it('should re-sort and recompute after moving an event', () => {
      const timeline = new Timeline();
      const moved = image(0, 100, 'moved.png');
      timeline.addEvent(moved);
      timeline.addEvent(audio(1000, 100, 'fixed.wav'));

      const result = timeline.updateEvent(moved.id, { onsetMs: 2000, durationMs: 500 });

      expect(result).toBe(moved);
      expect(fileNames(timeline.events)).toEqual(['fixed.wav', 'moved.png']);
      expect(timeline.durationMs).toBe(2500);
    });

    it('should keep the id and kind', () => {
      const timeline = new Timeline();
      const event = audio(0, 100);
      timeline.addEvent(event);

      timeline.updateEvent(event.id, { payload: { volume: 0.1 } });

      expect(timeline.getEventById(event.id)).toMatchObject({ id: event.id, kind: 'audio', payload: { volume: 0.1 } });
    });

    it('should return undefined for an unknown id', () => {
      expect(new Timeline().updateEvent('missing', { onsetMs: 5 })).toBeUndefined();
    });
  });

  describe('getEventsAtTime', () => {
    it('should include both boundaries', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(1000, 2000));

      expect(timeline.getEventsAtTime(1000)).toHaveLength(1);
      expect(timeline.getEventsAtTime(3000)).toHaveLength(1);
      expect(timeline.getEventsAtTime(999)).toHaveLength(0);
      expect(timeline.getEventsAtTime(3001)).toHaveLength(0);
    });

    it('should apply the tolerance on both sides', () => {
      const timeline = new Timeline();
      timeline.addEvent(image(1000, 2000));

      expect(timeline.getEventsAtTime(990, 10)).toHaveLength(1);
      expect(timeline.getEventsAtTime(3010, 10)).toHaveLength(1);
      expect(timeline.getEventsAtTime(3011, 10)).toHaveLength(0);
    });

    it('should report synchronized stimuli together', () => {
      const timeline = buildAttentionTest();

      expect(fileNames(timeline.getEventsAtTime(250))).toEqual(['fixation_cross.png']);
      expect(fileNames(timeline.getEventsAtTime(600))).toEqual(['beep.wav']);
      expect(fileNames(timeline.getEventsAtTime(1500))).toEqual(['target.png', 'tone.wav']);
      expect(fileNames(timeline.getEventsAtTime(2700))).toEqual(['target.png', 'distractor.png']);
      expect(timeline.durationMs).toBe(3500);
    });
  });

  describe('metadata', () => {
    it('should update name and description', () => {
      const timeline = new Timeline();
      timeline.setMetadata({ name: 'Oddball' });
      timeline.setMetadata({ description: 'Auditory oddball' });

      expect(timeline.metadata).toEqual({ name: 'Oddball', description: 'Auditory oddball', durationMs: 0 });
    });

    it('should clear events but keep the name', () => {
      const timeline = buildAttentionTest();
      timeline.clear();

      expect(timeline.size).toBe(0);
      expect(timeline.metadata).toEqual({ name: 'Attention Test', description: 'Multi-modal', durationMs: 0 });
    });
  });

  // ===========================================================================
  // Serialization
  // ===========================================================================

  describe('toSerializable', () => {
    it('should write the native structure', () => {
      const timeline = new Timeline({ metadata: { name: 'T' } });
      timeline.addEvent(
        createAudioEvent({ onsetMs: 500, durationMs: 200, payload: { filePath: 'beep.wav', volume: 0.5, markerCode: 9 } })
      );
      timeline.addEvent(createImageEvent({ onsetMs: 0, durationMs: 500, payload: { filePath: 'cross.png' } }));

      expect(timeline.toSerializable()).toEqual({
        metadata: { name: 'T', description: '', duration_ms: 700 },
        events: [
          {
            event_type: 'image',
            timestamp_ms: 0,
            data: { file_path: 'cross.png', duration_ms: 500, position: 'center' },
          },
          {
            event_type: 'audio',
            timestamp_ms: 500,
            data: { file_path: 'beep.wav', duration_ms: 200, volume: 0.5, marker_code: 9 },
          },
        ],
      });
    });

    it('should never let extensions stand in for payload fields', () => {
      const timeline = new Timeline();
      timeline.addEvent({
        id: 'hand-built',
        kind: 'image',
        onsetMs: 0,
        durationMs: 10,
        payload: { filePath: 'a.png', position: 'center' },
        extensions: { marker_code: 999, volume: 0.3 },
      });

      expect(timeline.toSerializable().events[0]?.data).toEqual({
        file_path: 'a.png',
        duration_ms: 10,
        position: 'center',
        volume: 0.3,
      });
    });
  });

  describe('fromSerializable', () => {
    it('should reproduce events and metadata', () => {
      const original = buildAttentionTest();
      const restored = Timeline.fromSerializable(original.toSerializable());

      expect(restored.toSerializable()).toEqual(original.toSerializable());
      expect(restored.metadata).toEqual(original.metadata);
    });

    it('should assign new ids', () => {
      const original = buildAttentionTest();
      const restored = Timeline.fromSerializable(original.toSerializable());

      expect(restored.events[0]?.id).not.toBe(original.events[0]?.id);
    });

    it('should sort events that are stored out of order', () => {
      const timeline = Timeline.fromSerializable({
        events: [
          { event_type: 'image', timestamp_ms: 900, data: { file_path: 'late.png', duration_ms: 100 } },
          { event_type: 'image', timestamp_ms: 100, data: { file_path: 'early.png', duration_ms: 100 } },
        ],
      });

      expect(fileNames(timeline.events)).toEqual(['early.png', 'late.png']);
    });

    it('should recompute the duration instead of trusting the file', () => {
      const timeline = Timeline.fromSerializable({
        metadata: { name: 'T', description: '', duration_ms: 99999 },
        events: [{ event_type: 'audio', timestamp_ms: 100, data: { file_path: 'a.wav', duration_ms: 400 } }],
      });

      expect(timeline.durationMs).toBe(500);
    });

    it('should use defaults for missing metadata, position and volume', () => {
      const timeline = Timeline.fromSerializable({
        events: [
          { event_type: 'image', timestamp_ms: 0, data: { file_path: 'a.png', duration_ms: 100 } },
          { event_type: 'audio', timestamp_ms: 0, data: { file_path: 'a.wav', duration_ms: 100 } },
        ],
      });

      expect(timeline.metadata.name).toBe('Untitled Test');
      expect(timeline.events.map((event) => event.payload)).toEqual([
        { filePath: 'a.png', position: 'center' },
        { filePath: 'a.wav', volume: 1 },
      ]);
    });

    it('should accept the legacy filepath key and write file_path back', () => {
      const timeline = Timeline.fromSerializable({
        events: [{ event_type: 'image', timestamp_ms: 0, data: { filepath: '/old/a.png', duration_ms: 100 } }],
      });

      expect(timeline.toSerializable().events[0]?.data).toEqual({
        file_path: '/old/a.png',
        duration_ms: 100,
        position: 'center',
      });
    });

    it('should preserve unknown data and metadata keys', () => {
      const data = {
        metadata: { name: 'T', description: 'd', duration_ms: 100, author: 'lab-7' },
        events: [
          {
            event_type: 'audio',
            timestamp_ms: 0,
            data: { file_path: 'a.wav', duration_ms: 100, volume: 0.5, channel: 'left', loop: false },
          },
        ],
      };

      expect(Timeline.fromSerializable(data).toSerializable()).toEqual(data);
    });

    it('should drop a __proto__ data key and keep the rest', () => {
      const data: unknown = JSON.parse(
        '{"events":[{"event_type":"image","timestamp_ms":0,"data":{"file_path":"a.png","duration_ms":1,"__proto__":{"x":1},"extra":2}}]}'
      );

      const event = Timeline.fromSerializable(data).events[0];

      expect(event?.extensions).toEqual({ extra: 2 });
      expect(Object.keys(event?.extensions ?? {})).toEqual(['extra']);
    });

    it('should throw FormatError for a missing event_type', () => {
      const data = { events: [{ timestamp_ms: 0, data: { file_path: 'a.png', duration_ms: 1 } }] };

      expect(() => Timeline.fromSerializable(data)).toThrow(FormatError);
    });

    it('should list the offending paths', () => {
      const data = {
        events: [
          { event_type: 'image', timestamp_ms: 0, data: { file_path: 'a.png', duration_ms: 1 } },
          { event_type: 'audio', timestamp_ms: 0, data: { duration_ms: 1 } },
        ],
      };

      expect(() => Timeline.fromSerializable(data)).toThrow(
        'Malformed timeline data: events.1.data.file_path: Required'
      );
    });

    it('should reject data that is not an object', () => {
      expect(() => Timeline.fromSerializable(null)).toThrow(FormatError);
      expect(() => Timeline.fromSerializable([])).toThrow(FormatError);
    });
  });

  // ===========================================================================
  // Persistence
  // ===========================================================================

  describe('save and load', () => {
    let fileSystem: MemoryFileSystem;

    beforeEach(() => {
      fileSystem = new MemoryFileSystem({ directories: ['/tests'] });
    });

    it('should round-trip through a file', () => {
      const original = new Timeline({ fileSystem, metadata: { name: 'Saved' } });
      original.addEvent(image(0, 500, 'cross.png'));
      original.addEvent(audio(500, 200, 'beep.wav'));

      original.save('/tests/saved.json');
      const loaded = Timeline.load('/tests/saved.json', { fileSystem });

      expect(loaded.toSerializable()).toEqual(original.toSerializable());
    });

    it('should write indented JSON with a trailing newline', () => {
      const timeline = new Timeline({ fileSystem });
      timeline.save('/tests/empty.json');

      expect(fileSystem.readTextFile('/tests/empty.json')).toBe(
        '{\n  "metadata": {\n    "name": "Untitled Test",\n    "description": "",\n    "duration_ms": 0\n  },\n  "events": []\n}\n'
      );
    });

    it('should surface a missing directory as TimelineIOError', () => {
      const timeline = new Timeline({ fileSystem });

      expect(() => timeline.save('/missing/t.json')).toThrow(TimelineIOError);
    });

    it('should surface a missing file as TimelineIOError', () => {
      expect(() => Timeline.load('/tests/none.json', { fileSystem })).toThrow(TimelineIOError);
    });

    it('should turn invalid JSON into FormatError with the cause', () => {
      fileSystem.writeTextFile('/tests/broken.json', '{ "events": [');

      let caught: unknown;
      try {
        Timeline.load('/tests/broken.json', { fileSystem });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FormatError);
      expect(caught instanceof FormatError && caught.cause).toBeInstanceOf(SyntaxError);
    });

    it('should save a loaded timeline with the same file system', () => {
      fileSystem.writeTextFile('/tests/in.json', JSON.stringify({ metadata: { name: 'In' } }));

      const loaded = Timeline.load('/tests/in.json', { fileSystem });
      loaded.save('/tests/out.json');

      expect(fileSystem.exists('/tests/out.json')).toBe(true);
    });
  });
});
