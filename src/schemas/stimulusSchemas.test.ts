/**
 * Stimulus Schema Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/core/errors';
import { assertValidStimulusEvent, validateStimulusEvent } from './stimulusSchemas';

const validImage = {
  kind: 'image',
  onsetMs: 0,
  durationMs: 500,
  payload: { filePath: 'stimuli/fixation.png', position: 'center' },
} as const;

const validAudio = {
  kind: 'audio',
  onsetMs: 600,
  durationMs: 200,
  payload: { filePath: 'stimuli/beep.wav', volume: 0.8, markerCode: 12 },
} as const;

describe('validateStimulusEvent', () => {
  it('should accept a valid image stimulus', () => {
    const result = validateStimulusEvent(validImage);

    expect(result).toEqual({ valid: true, value: validImage });
  });

  it('should accept a valid audio stimulus with a marker code', () => {
    const result = validateStimulusEvent(validAudio);

    expect(result.valid).toBe(true);
  });

  it('should apply the default position and volume', () => {
    const image = validateStimulusEvent({ ...validImage, payload: { filePath: 'a.png' } });
    const audio = validateStimulusEvent({ ...validAudio, payload: { filePath: 'a.wav' } });

    expect(image.valid && image.value.payload).toEqual({ filePath: 'a.png', position: 'center' });
    expect(audio.valid && audio.value.payload).toEqual({ filePath: 'a.wav', volume: 1 });
  });

  it('should accept both volume bounds', () => {
    expect(validateStimulusEvent({ ...validAudio, payload: { filePath: 'a.wav', volume: 0 } }).valid).toBe(true);
    expect(validateStimulusEvent({ ...validAudio, payload: { filePath: 'a.wav', volume: 1 } }).valid).toBe(true);
  });

  it('should reject a negative onset', () => {
    const result = validateStimulusEvent({ ...validImage, onsetMs: -1 });

    expect(result).toEqual({
      valid: false,
      errors: [{ path: 'onsetMs', message: 'Onset must be 0 ms or later' }],
    });
  });

  it('should reject zero and fractional durations', () => {
    expect(validateStimulusEvent({ ...validImage, durationMs: 0 })).toEqual({
      valid: false,
      errors: [{ path: 'durationMs', message: 'Duration must be greater than 0 ms' }],
    });
    expect(validateStimulusEvent({ ...validImage, durationMs: 2.5 })).toEqual({
      valid: false,
      errors: [{ path: 'durationMs', message: 'Duration must be a whole number of milliseconds' }],
    });
  });

  it('should reject an out-of-range volume', () => {
    const result = validateStimulusEvent({ ...validAudio, payload: { filePath: 'a.wav', volume: 1.4 } });

    expect(result).toEqual({
      valid: false,
      errors: [{ path: 'payload.volume', message: 'Volume must be between 0.0 and 1.0' }],
    });
  });

  it('should reject marker codes outside 1-255', () => {
    for (const markerCode of [0, 256]) {
      const result = validateStimulusEvent({ ...validAudio, payload: { filePath: 'a.wav', markerCode } });
      expect(result).toEqual({
        valid: false,
        errors: [{ path: 'payload.markerCode', message: 'Marker code must be between 1 and 255' }],
      });
    }
  });

  it('should reject a blank file path', () => {
    const result = validateStimulusEvent({ ...validImage, payload: { filePath: '   ' } });

    expect(result).toEqual({
      valid: false,
      errors: [{ path: 'payload.filePath', message: 'Please select a file' }],
    });
  });

  it('should reject an unknown position', () => {
    const result = validateStimulusEvent({ ...validImage, payload: { filePath: 'a.png', position: 'middle' } });

    expect(result.valid).toBe(false);
    expect(!result.valid && result.errors.map((e) => e.path)).toEqual(['payload.position']);
  });

  it('should report every violation at once', () => {
    const result = validateStimulusEvent({
      kind: 'audio',
      onsetMs: -5,
      durationMs: 0,
      payload: { filePath: 'a.wav', volume: 2 },
    });

    expect(!result.valid && result.errors.map((e) => e.path)).toEqual(['onsetMs', 'durationMs', 'payload.volume']);
  });

  it('should reject an unknown kind', () => {
    const result = validateStimulusEvent({ ...validImage, kind: 'video' });

    expect(!result.valid && result.errors.map((e) => e.path)).toEqual(['kind']);
  });
});

describe('assertValidStimulusEvent', () => {
  it('should return the parsed value', () => {
    expect(assertValidStimulusEvent(validAudio)).toEqual(validAudio);
  });

  it('should throw ValidationError with the issues', () => {
    expect(() => assertValidStimulusEvent({ ...validImage, onsetMs: -1 })).toThrow(ValidationError);
    expect(() => assertValidStimulusEvent({ ...validImage, onsetMs: -1 })).toThrow(
      'Invalid stimulus: onsetMs: Onset must be 0 ms or later'
    );
  });
});
