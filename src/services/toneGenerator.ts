/**
 * Tone Generator
 *
 * Pure sine tones for auditory stimuli, written as mono 16-bit PCM WAV.
 *
 * @example
 * ```typescript
 * const samples = generateTone({ frequency: 1000, durationSeconds: 0.2 });
 * saveTone(samples, 'stimuli/beep.wav');
 *
 * generateFrequencyRange(
 *   { startFrequency: 500, endFrequency: 1000, step: 250, durationSeconds: 0.5 },
 *   'stimuli/tones'
 * ); // tone_500Hz.wav, tone_750Hz.wav, tone_1000Hz.wav
 * ```
 */

import { join } from 'node:path';
import type { z } from 'zod';
import { getSetting } from '@/config/settings';
import { ValidationError } from '@/core/errors';
import {
  FrequencyRangeRequestSchema,
  ToneRequestSchema,
  toErrorIssues,
  type FrequencyRangeRequest,
  type ToneRequest,
} from '@/schemas';
import { nodeFileSystem, type FileSystem } from './fileSystem';
import { createLogger } from './logger';

const logger = createLogger('ToneGenerator');

// =============================================================================
// Constants
// =============================================================================

const WAV_HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;
const NUM_CHANNELS = 1;
const INT16_MAX = 32767;

export interface ToneOptions {
  /** Defaults to the TONE_SAMPLE_RATE setting */
  sampleRate?: number;
  fileSystem?: FileSystem;
}

// =============================================================================
// Helpers
// =============================================================================

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toErrorIssues(result.error));
  }
  return result.data;
}

/**
 * `<prefix>_<f>Hz.wav`, with one decimal for non-integer frequencies
 */
export function toneFileName(prefix: string, frequency: number): string {
  const label = Number.isInteger(frequency) ? String(frequency) : frequency.toFixed(1);
  return `${prefix}_${label}Hz.wav`;
}

// =============================================================================
// Synthesis
// =============================================================================

/**
 * Sample a sine wave as signed 16-bit values. Samples are truncated toward
 * zero, so a full-scale tone peaks at 32767.
 *
 * @throws ValidationError for a non-positive frequency or duration, or an amplitude outside [0, 1]
 */
export function generateTone(request: ToneRequest, options: ToneOptions = {}): Int16Array {
  const { frequency, durationSeconds, amplitude } = parseOrThrow(ToneRequestSchema, request);
  const sampleRate = options.sampleRate ?? getSetting('TONE_SAMPLE_RATE');
  const numSamples = Math.floor(sampleRate * durationSeconds);
  const samples = new Int16Array(numSamples);

  for (let i = 0; i < numSamples; i++) {
    const t = (i * durationSeconds) / numSamples;
    samples[i] = Math.trunc(amplitude * Math.sin(2 * Math.PI * frequency * t) * INT16_MAX);
  }

  return samples;
}

/**
 * Wrap samples in a RIFF/WAVE container (PCM, mono, 16-bit)
 */
export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const bytesPerSample = BITS_PER_SAMPLE / 8;
  const dataSize = samples.length * bytesPerSample;
  const buffer = Buffer.alloc(WAV_HEADER_SIZE + dataSize);

  // RIFF header
  buffer.write('RIFF', 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8);

  // fmt chunk
  buffer.write('fmt ', 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20); // PCM
  buffer.writeUInt16LE(NUM_CHANNELS, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * NUM_CHANNELS * bytesPerSample, 28);
  buffer.writeUInt16LE(NUM_CHANNELS * bytesPerSample, 32);
  buffer.writeUInt16LE(BITS_PER_SAMPLE, 34);

  // data chunk
  buffer.write('data', 36);
  buffer.writeUInt32LE(dataSize, 40);

  samples.forEach((sample, i) => {
    buffer.writeInt16LE(sample, WAV_HEADER_SIZE + i * bytesPerSample);
  });

  return buffer;
}

// =============================================================================
// Files
// =============================================================================

/**
 * @throws TimelineIOError when the file cannot be written
 */
export function saveTone(samples: Int16Array, path: string, options: ToneOptions = {}): void {
  const sampleRate = options.sampleRate ?? getSetting('TONE_SAMPLE_RATE');
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  fileSystem.writeBinaryFile(path, encodeWav(samples, sampleRate));
}

/** Slack for fractional steps that land on the end frequency */
const STEP_EPSILON = 1e-9;

/**
 * Frequencies from `startFrequency` in `step` increments, never past
 * `endFrequency` (included when a step lands on it).
 */
export function listFrequencies(startFrequency: number, endFrequency: number, step: number): number[] {
  if (step <= 0 || endFrequency < startFrequency) {
    return [];
  }
  const count = Math.floor((endFrequency - startFrequency) / step + STEP_EPSILON) + 1;
  return Array.from({ length: count }, (_, i) => startFrequency + i * step);
}

/**
 * Write one WAV per frequency into `outputDir` (created if missing).
 *
 * @returns the written file paths, in ascending frequency
 * @throws ValidationError for invalid ranges or tone parameters
 * @throws TimelineIOError when a file cannot be written
 */
export function generateFrequencyRange(
  request: FrequencyRangeRequest,
  outputDir: string,
  options: ToneOptions = {}
): string[] {
  const { startFrequency, endFrequency, step, durationSeconds, amplitude, prefix } = parseOrThrow(
    FrequencyRangeRequestSchema,
    request
  );
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  fileSystem.mkdir(outputDir, { recursive: true });

  const written: string[] = [];
  for (const frequency of listFrequencies(startFrequency, endFrequency, step)) {
    const samples = generateTone({ frequency, durationSeconds, amplitude }, options);
    const path = join(outputDir, toneFileName(prefix, frequency));
    saveTone(samples, path, { ...options, fileSystem });
    written.push(path);
  }

  logger.info('Generated tone range', { outputDir, files: written.length });
  return written;
}
