/**
 * Export Formatters
 *
 * Pure functions from the serializable timeline to file text. None of them
 * touch the file system; exportTimeline.ts writes what they return.
 *
 * Every tabular formatter emits rows in ascending onset order (stable, so
 * simultaneous events keep their stored order), whatever order the input
 * events are in. A missing duration reads as 0 and a missing file as an
 * empty filename.
 */

import { DEFAULT_MARKER_CODE, DEFAULT_TEST_NAME, type SerializedEvent } from '@/types';
import { getBasename, getStem } from '@/utils/stimulusPath';
import { getExportFormatInfo, type ExportFormat } from './formats';

// =============================================================================
// Types
// =============================================================================

/** What the formatters read; `Timeline.toSerializable()` satisfies it */
export interface ExportSource {
  metadata?: { name?: string; description?: string; [key: string]: unknown };
  events?: readonly SerializedEvent[];
}

export type Formatter = (source: ExportSource) => string;

type Cell = string | number;

// =============================================================================
// Row Helpers
// =============================================================================

/**
 * Quote a field only when it holds the delimiter, a quote or a line break.
 * Embedded quotes are doubled.
 */
export function quoteField(value: Cell, delimiter: string): string {
  const text = String(value);
  const needsQuotes =
    text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r');
  return needsQuotes ? `"${text.replace(/"/g, '""')}"` : text;
}

function formatRows(rows: readonly (readonly Cell[])[], delimiter: string, lineTerminator: string): string {
  return rows
    .map((row) => row.map((cell) => quoteField(cell, delimiter)).join(delimiter))
    .map((line) => `${line}${lineTerminator}`)
    .join('');
}

/** Copy of the events in ascending onset order */
export function sortedEvents(source: ExportSource): SerializedEvent[] {
  return [...(source.events ?? [])].sort((a, b) => a.timestamp_ms - b.timestamp_ms);
}

function durationOf(event: SerializedEvent): number {
  return event.data.duration_ms ?? 0;
}

function fileNameOf(event: SerializedEvent): string {
  const filePath = event.data.file_path;
  return filePath ? getBasename(filePath) : '';
}

function markerCodeOf(event: SerializedEvent): number {
  return event.data.marker_code ?? DEFAULT_MARKER_CODE;
}

function testName(source: ExportSource): string {
  return source.metadata?.name ?? DEFAULT_TEST_NAME;
}

function testDescription(source: ExportSource): string {
  return source.metadata?.description ?? '';
}

// =============================================================================
// Native
// =============================================================================

export const formatNative: Formatter = (source) => `${JSON.stringify(source, null, 2)}\n`;

// =============================================================================
// EEGLAB Marker List
// =============================================================================

const MARKER_LIST_HEADER = ['Latency(ms)', 'Type', 'Duration(ms)', 'EventID', 'StimulusFile'];

/**
 * Tab-delimited event list for EEGLAB import. The column header appears
 * before the comment block and again right above the data rows.
 */
export const formatMarkerList: Formatter = (source) => {
  const rows: Cell[][] = [
    MARKER_LIST_HEADER,
    ['# Exported from Stimulus Timeline'],
    [`# Test: ${testName(source)}`],
    [`# Description: ${testDescription(source)}`],
    [],
    MARKER_LIST_HEADER,
  ];

  sortedEvents(source).forEach((event, index) => {
    rows.push([event.timestamp_ms, event.event_type, durationOf(event), index + 1, fileNameOf(event)]);
  });

  return formatRows(rows, '\t', getExportFormatInfo('eeglab').lineTerminator);
};

// =============================================================================
// E-Prime Trial Table
// =============================================================================

/**
 * Procedure/trial table in the layout E-Prime reads: a header block, one
 * `TrialProc` row per event, and an end-of-data footer. The byte order mark
 * is added when the file is written.
 */
export const formatTrialTable: Formatter = (source) => {
  const rows: Cell[][] = [
    ['*** Header Start ***'],
    ['VersionNumber:', '1.0'],
    ['LevelName:', 'Session'],
    ['Title:', testName(source)],
    ['Description:', testDescription(source)],
    ['Exported:', 'Stimulus Timeline'],
    ['*** Header End ***'],
    [],
    ['Procedure', 'Trial', 'Stimulus', 'StimulusFile', 'OnsetTime', 'Duration', 'Type', 'Modality'],
  ];

  sortedEvents(source).forEach((event, index) => {
    const trial = index + 1;
    const fileName = fileNameOf(event);
    const stimulus = fileName ? getStem(fileName) : `${event.event_type}_${trial}`;
    rows.push([
      'TrialProc',
      trial,
      stimulus,
      fileName,
      event.timestamp_ms,
      durationOf(event),
      event.event_type,
      event.event_type.toUpperCase(),
    ]);
  });

  rows.push([], ['*** End of data ***']);

  return formatRows(rows, '\t', getExportFormatInfo('eprime').lineTerminator);
};

// =============================================================================
// Marker Code CSV
// =============================================================================

export const formatMarkerCsv: Formatter = (source) => {
  const rows: Cell[][] = [['onset_ms', 'duration_ms', 'marker_code', 'event_type', 'stimulus_file']];

  for (const event of sortedEvents(source)) {
    rows.push([event.timestamp_ms, durationOf(event), markerCodeOf(event), event.event_type, fileNameOf(event)]);
  }

  return formatRows(rows, ',', getExportFormatInfo('csv').lineTerminator);
};

// =============================================================================
// BIDS events.tsv
// =============================================================================

function msToSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

/**
 * BIDS events table. Times are seconds; a missing value is written as
 * `n/a`, as BIDS requires.
 */
export const formatBidsTsv: Formatter = (source) => {
  const rows: Cell[][] = [['onset', 'duration', 'value', 'event_type', 'stim_file']];

  for (const event of sortedEvents(source)) {
    rows.push([
      msToSeconds(event.timestamp_ms),
      msToSeconds(durationOf(event)),
      markerCodeOf(event),
      event.event_type,
      fileNameOf(event) || 'n/a',
    ]);
  }

  return formatRows(rows, '\t', getExportFormatInfo('bids').lineTerminator);
};

// =============================================================================
// Registry
// =============================================================================

export const FORMATTERS: Readonly<Record<ExportFormat, Formatter>> = {
  json: formatNative,
  eeglab: formatMarkerList,
  eprime: formatTrialTable,
  csv: formatMarkerCsv,
  bids: formatBidsTsv,
};
