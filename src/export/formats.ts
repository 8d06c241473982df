/**
 * Export Formats
 *
 * Catalog of export targets and the rules for picking one from a path.
 */

import { getExtension, getStem } from '@/utils/stimulusPath';

// =============================================================================
// Types
// =============================================================================

export type ExportFormat = 'json' | 'eeglab' | 'eprime' | 'csv' | 'bids';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'eeglab', 'eprime', 'csv', 'bids'] as const;

export interface ExportFormatInfo {
  name: string;
  /** Extension including the dot */
  extension: string;
  description: string;
  /** Save dialog filter */
  filter: FileFilter;
  lineTerminator: '\n' | '\r\n';
  /** Prefix the file with a UTF-8 byte order mark */
  byteOrderMark: boolean;
}

export interface FileFilter {
  name: string;
  extensions: string[];
}

// =============================================================================
// Catalog
// =============================================================================

const FORMAT_INFO: Readonly<Record<ExportFormat, ExportFormatInfo>> = {
  json: {
    name: 'JSON Format',
    extension: '.json',
    description: 'Native format (editable)',
    filter: { name: 'JSON files', extensions: ['json'] },
    lineTerminator: '\n',
    byteOrderMark: false,
  },
  eeglab: {
    name: 'EEGLAB Event List',
    extension: '.txt',
    description: 'Tab-delimited event markers for EEGLAB',
    filter: { name: 'EEGLAB files', extensions: ['txt'] },
    lineTerminator: '\r\n',
    byteOrderMark: false,
  },
  eprime: {
    name: 'E-Prime Format',
    extension: '.txt',
    description: 'Tab-delimited procedure/trial table for E-Prime',
    filter: { name: 'E-Prime files', extensions: ['txt'] },
    lineTerminator: '\r\n',
    byteOrderMark: true,
  },
  csv: {
    name: 'Marker Code CSV',
    extension: '.csv',
    description: 'Comma-separated onsets with trigger codes',
    filter: { name: 'CSV files', extensions: ['csv'] },
    lineTerminator: '\n',
    byteOrderMark: false,
  },
  bids: {
    name: 'BIDS Events',
    extension: '.tsv',
    description: 'BIDS events.tsv (onset and duration in seconds)',
    filter: { name: 'TSV files', extensions: ['tsv'] },
    lineTerminator: '\n',
    byteOrderMark: false,
  },
};

// =============================================================================
// Queries
// =============================================================================

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

export function getExportFormatInfo(): Readonly<Record<ExportFormat, ExportFormatInfo>>;
export function getExportFormatInfo(format: ExportFormat): ExportFormatInfo;
export function getExportFormatInfo(
  format?: ExportFormat
): ExportFormatInfo | Readonly<Record<ExportFormat, ExportFormatInfo>> {
  return format === undefined ? FORMAT_INFO : FORMAT_INFO[format];
}

/**
 * Save dialog filters: every supported extension first, then one per
 * format, then a catch-all.
 */
export function getFileFilters(): FileFilter[] {
  const perFormat = EXPORT_FORMATS.map((format) => FORMAT_INFO[format].filter);
  const supported = [...new Set(perFormat.flatMap((filter) => filter.extensions))];

  return [
    { name: 'All supported formats', extensions: supported },
    ...perFormat.map((filter) => ({ name: filter.name, extensions: [...filter.extensions] })),
    { name: 'All files', extensions: ['*'] },
  ];
}

/**
 * Pick a format from the output path.
 *
 * `.txt` is shared by two formats, so the file stem decides: a stem
 * mentioning `eeg` wins over one mentioning `eprime`/`e-prime`, and a plain
 * `.txt` falls back to the EEGLAB list. Unknown extensions export JSON.
 */
export function detectFormatFromPath(path: string): ExportFormat {
  switch (getExtension(path)) {
    case 'json':
      return 'json';
    case 'csv':
      return 'csv';
    case 'tsv':
      return 'bids';
    case 'txt': {
      const stem = getStem(path).toLowerCase();
      if (stem.includes('eeglab') || stem.includes('eeg')) return 'eeglab';
      if (stem.includes('eprime') || stem.includes('e-prime')) return 'eprime';
      return 'eeglab';
    }
    default:
      return 'json';
  }
}
