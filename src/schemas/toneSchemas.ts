/**
 * Tone Generator Schemas
 */

import { z } from 'zod';

const PositiveFrequency = z
  .number({ invalid_type_error: 'Frequency must be a number' })
  .finite()
  .positive('Frequency must be positive');

export const AmplitudeSchema = z
  .number({ invalid_type_error: 'Amplitude must be a number' })
  .min(0, 'Amplitude must be between 0.0 and 1.0')
  .max(1, 'Amplitude must be between 0.0 and 1.0');

export const ToneDurationSchema = z
  .number({ invalid_type_error: 'Duration must be a number' })
  .finite()
  .positive('Duration must be positive');

export const ToneRequestSchema = z.object({
  frequency: PositiveFrequency,
  durationSeconds: ToneDurationSchema,
  amplitude: AmplitudeSchema.default(0.5),
});

export const FrequencyRangeRequestSchema = z
  .object({
    startFrequency: PositiveFrequency,
    endFrequency: PositiveFrequency,
    step: z.number().finite().positive('Step must be positive'),
    durationSeconds: ToneDurationSchema,
    amplitude: AmplitudeSchema.default(0.5),
    prefix: z.string().trim().min(1, 'Prefix cannot be empty').default('tone'),
  })
  .refine((request) => request.startFrequency < request.endFrequency, {
    message: 'Start frequency must be less than end frequency',
    path: ['startFrequency'],
  });

export type ToneRequest = z.input<typeof ToneRequestSchema>;
export type FrequencyRangeRequest = z.input<typeof FrequencyRangeRequestSchema>;
