/**
 * Timeline File Schemas
 *
 * Structural validation for the native JSON format. These schemas check
 * shape only (keys present, right JSON types, known enum values); range
 * checks such as "onset >= 0" live in stimulusSchemas.
 *
 * Unknown keys in `metadata` and in each event's `data` pass through so
 * that newer files survive a load/save cycle.
 */

import { z } from 'zod';
import type { ErrorIssue } from '@/core/errors';
import type { ImagePosition, StimulusKind } from '@/types';

// =============================================================================
// Shared
// =============================================================================

export const StimulusKindSchema = z.enum(['image', 'audio']) satisfies z.ZodType<StimulusKind>;

export const ImagePositionSchema = z.enum([
  'center',
  'top-left',
  'top-right',
  'bottom-left',
  'bottom-right',
]) satisfies z.ZodType<ImagePosition>;

/**
 * Convert zod issues into the `{ path, message }` list carried by our errors
 */
export function toErrorIssues(error: z.ZodError): ErrorIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// =============================================================================
// Event Data
// =============================================================================

const WholeMs = z.number().int();

/**
 * Keys shared by both kinds. `filepath` is the key older files used for
 * the stimulus path; either spelling satisfies the requirement.
 */
const baseDataShape = {
  file_path: z.string().optional(),
  filepath: z.string().optional(),
  duration_ms: WholeMs,
  marker_code: WholeMs.optional(),
};

function requireFilePath<T extends { file_path?: string; filepath?: string }>(
  data: T,
  ctx: z.RefinementCtx
): void {
  if (data.file_path === undefined && data.filepath === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['file_path'],
      message: 'Required',
    });
  }
}

export const ImageEventDataSchema = z
  .object({
    ...baseDataShape,
    position: ImagePositionSchema.optional(),
  })
  .passthrough()
  .superRefine(requireFilePath);

export const AudioEventDataSchema = z
  .object({
    ...baseDataShape,
    volume: z.number().optional(),
  })
  .passthrough()
  .superRefine(requireFilePath);

/** Keys each kind consumes; anything else in `data` is an extension */
export const KNOWN_DATA_KEYS: Readonly<Record<StimulusKind, readonly string[]>> = {
  image: ['file_path', 'filepath', 'duration_ms', 'marker_code', 'position'],
  audio: ['file_path', 'filepath', 'duration_ms', 'marker_code', 'volume'],
};

// =============================================================================
// Events & Timeline
// =============================================================================

export const SerializedEventSchema = z.discriminatedUnion('event_type', [
  z.object({
    event_type: z.literal('image'),
    timestamp_ms: WholeMs,
    data: ImageEventDataSchema,
  }),
  z.object({
    event_type: z.literal('audio'),
    timestamp_ms: WholeMs,
    data: AudioEventDataSchema,
  }),
]);

export type ParsedSerializedEvent = z.infer<typeof SerializedEventSchema>;

export const SerializedMetadataSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    duration_ms: z.number().optional(),
  })
  .passthrough();

export const SerializedTimelineSchema = z.object({
  metadata: SerializedMetadataSchema.optional(),
  events: z.array(SerializedEventSchema).optional(),
});

export type ParsedSerializedTimeline = z.infer<typeof SerializedTimelineSchema>;

/**
 * Parse raw native-format data.
 *
 * @returns Parsed data, or the issues that make it unreadable
 */
export function parseSerializedTimeline(
  input: unknown
): { success: true; data: ParsedSerializedTimeline } | { success: false; issues: ErrorIssue[] } {
  const result = SerializedTimelineSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, issues: toErrorIssues(result.error) };
}
