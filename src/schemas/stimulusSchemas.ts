/**
 * Stimulus Schemas
 *
 * Range and business validation for stimulus input coming from an editor
 * (dialogs, scripts, imports). The Timeline itself trusts its caller, so
 * this is the layer that rejects negative onsets, zero durations and
 * out-of-range volumes or marker codes.
 *
 * @module schemas/stimulusSchemas
 */

import { z } from 'zod';
import { ValidationError, type ErrorIssue } from '@/core/errors';
import { MAX_MARKER_CODE, MIN_MARKER_CODE } from '@/types';
import { ImagePositionSchema, toErrorIssues } from './timelineFileSchemas';

// =============================================================================
// Field Schemas
// =============================================================================

export const OnsetMsSchema = z
  .number({ invalid_type_error: 'Onset must be a number' })
  .int('Onset must be a whole number of milliseconds')
  .nonnegative('Onset must be 0 ms or later');

export const DurationMsSchema = z
  .number({ invalid_type_error: 'Duration must be a number' })
  .int('Duration must be a whole number of milliseconds')
  .positive('Duration must be greater than 0 ms');

export const VolumeSchema = z
  .number({ invalid_type_error: 'Volume must be a number' })
  .min(0, 'Volume must be between 0.0 and 1.0')
  .max(1, 'Volume must be between 0.0 and 1.0');

export const MarkerCodeSchema = z
  .number({ invalid_type_error: 'Marker code must be a number' })
  .int('Marker code must be a whole number')
  .min(MIN_MARKER_CODE, `Marker code must be between ${MIN_MARKER_CODE} and ${MAX_MARKER_CODE}`)
  .max(MAX_MARKER_CODE, `Marker code must be between ${MIN_MARKER_CODE} and ${MAX_MARKER_CODE}`);

export const FilePathSchema = z
  .string({ required_error: 'Please select a file' })
  .trim()
  .min(1, 'Please select a file');

// =============================================================================
// Stimulus Input Schemas
// =============================================================================

export const ImagePayloadInputSchema = z.object({
  filePath: FilePathSchema,
  position: ImagePositionSchema.default('center'),
  markerCode: MarkerCodeSchema.optional(),
});

export const AudioPayloadInputSchema = z.object({
  filePath: FilePathSchema,
  volume: VolumeSchema.default(1),
  markerCode: MarkerCodeSchema.optional(),
});

export const ImageStimulusInputSchema = z.object({
  kind: z.literal('image'),
  onsetMs: OnsetMsSchema,
  durationMs: DurationMsSchema,
  payload: ImagePayloadInputSchema,
});

export const AudioStimulusInputSchema = z.object({
  kind: z.literal('audio'),
  onsetMs: OnsetMsSchema,
  durationMs: DurationMsSchema,
  payload: AudioPayloadInputSchema,
});

export const StimulusInputSchema = z.discriminatedUnion('kind', [
  ImageStimulusInputSchema,
  AudioStimulusInputSchema,
]);

/** What an editor hands in (defaults not yet applied) */
export type StimulusInput = z.input<typeof StimulusInputSchema>;
export type ImageStimulusInput = z.input<typeof ImageStimulusInputSchema>;
export type AudioStimulusInput = z.input<typeof AudioStimulusInputSchema>;

/** Input after validation, defaults applied */
export type ValidStimulus = z.output<typeof StimulusInputSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type StimulusValidationResult =
  | { valid: true; value: ValidStimulus }
  | { valid: false; errors: ErrorIssue[] };

/**
 * Check stimulus input against every range rule.
 *
 * @example
 * ```ts
 * const result = validateStimulusEvent({
 *   kind: 'audio',
 *   onsetMs: 500,
 *   durationMs: 200,
 *   payload: { filePath: 'beep.wav', volume: 1.4 },
 * });
 * // { valid: false, errors: [{ path: 'payload.volume', message: 'Volume must be between 0.0 and 1.0' }] }
 * ```
 */
export function validateStimulusEvent(input: unknown): StimulusValidationResult {
  const result = StimulusInputSchema.safeParse(input);
  if (result.success) {
    return { valid: true, value: result.data };
  }
  return { valid: false, errors: toErrorIssues(result.error) };
}

/**
 * Validate stimulus input, throwing ValidationError with every violation.
 */
export function assertValidStimulusEvent(input: unknown): ValidStimulus {
  const result = validateStimulusEvent(input);
  if (!result.valid) {
    throw new ValidationError(result.errors);
  }
  return result.value;
}
