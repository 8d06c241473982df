/**
 * Timeline Export
 *
 * Formats a serializable timeline and writes it through the FileSystem port.
 */

import { UnsupportedFormatError } from '@/core/errors';
import { nodeFileSystem, type FileSystem } from '@/services/fileSystem';
import { createLogger } from '@/services/logger';
import { detectFormatFromPath, getExportFormatInfo, isExportFormat, type ExportFormat } from './formats';
import { FORMATTERS, type ExportSource } from './formatters';

const logger = createLogger('Export');

const UTF8_BOM = '\uFEFF';

export interface ExportOptions {
  fileSystem?: FileSystem;
}

/**
 * Resolve an explicit selector, or detect one from the path when absent.
 *
 * @throws UnsupportedFormatError for a selector no formatter handles
 */
export function resolveExportFormat(path: string, format?: string): ExportFormat {
  if (format === undefined) {
    return detectFormatFromPath(path);
  }
  const normalized = format.trim().toLowerCase();
  if (!isExportFormat(normalized)) {
    throw new UnsupportedFormatError(format);
  }
  return normalized;
}

/**
 * Render the timeline in the given format and write it to `path`.
 *
 * @returns the format that was written
 * @throws UnsupportedFormatError for an unknown explicit format
 * @throws TimelineIOError when the file cannot be written
 *
 * @example
 * ```ts
 * exportTimeline(timeline.toSerializable(), 'session1_eeglab.txt');
 * exportTimeline(timeline.toSerializable(), 'out/events.tsv', 'bids');
 * ```
 */
export function exportTimeline(
  source: ExportSource,
  path: string,
  format?: string,
  options: ExportOptions = {}
): ExportFormat {
  const resolved = resolveExportFormat(path, format);
  const fileSystem = options.fileSystem ?? nodeFileSystem;

  const body = FORMATTERS[resolved](source);
  const content = getExportFormatInfo(resolved).byteOrderMark ? `${UTF8_BOM}${body}` : body;

  try {
    fileSystem.writeTextFile(path, content);
  } catch (error) {
    logger.error('Export failed', { path, format: resolved, error });
    throw error;
  }

  logger.info('Timeline exported', { path, format: resolved, events: source.events?.length ?? 0 });
  return resolved;
}
