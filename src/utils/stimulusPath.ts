/**
 * Stimulus Path Utilities
 *
 * Filename helpers that treat both `/` and `\` as separators, so paths
 * written on Windows export the same filename when read elsewhere.
 */

import type { StimulusKind } from '@/types';

// =============================================================================
// Constants
// =============================================================================

/** Extensions offered by the image file picker */
export const IMAGE_EXTENSIONS: readonly string[] = [
  'png',
  'jpg',
  'jpeg',
  'bmp',
  'gif',
  'tiff',
  'tif',
  'webp',
  'svg',
  'ico',
];

/** Extensions offered by the audio file picker */
export const AUDIO_EXTENSIONS: readonly string[] = ['wav', 'mp3', 'ogg'];

// =============================================================================
// Name Parts
// =============================================================================

/**
 * Final path segment. `''` for an empty path or one ending in a separator.
 */
export function getBasename(path: string): string {
  const segments = path.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

/**
 * Lowercase extension without the dot, or `''`.
 * A leading dot (`.hidden`) is not an extension.
 */
export function getExtension(path: string): string {
  const name = getBasename(path);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
}

/** Basename without its extension */
export function getStem(path: string): string {
  const name = getBasename(path);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

// =============================================================================
// Kind Inference
// =============================================================================

/**
 * Stimulus kind implied by a file's extension, or null when unknown
 */
export function inferKindFromPath(path: string): StimulusKind | null {
  const extension = getExtension(path);
  if (IMAGE_EXTENSIONS.includes(extension)) return 'image';
  if (AUDIO_EXTENSIONS.includes(extension)) return 'audio';
  return null;
}

/**
 * File picker filter for a stimulus kind
 */
export function getStimulusFileFilter(kind: StimulusKind): { name: string; extensions: string[] } {
  return kind === 'image'
    ? { name: 'Image files', extensions: [...IMAGE_EXTENSIONS] }
    : { name: 'Audio files', extensions: [...AUDIO_EXTENSIONS] };
}
