export {
  EXPORT_FORMATS,
  detectFormatFromPath,
  getExportFormatInfo,
  getFileFilters,
  isExportFormat,
  type ExportFormat,
  type ExportFormatInfo,
  type FileFilter,
} from './formats';
export {
  FORMATTERS,
  formatNative,
  formatMarkerList,
  formatTrialTable,
  formatMarkerCsv,
  formatBidsTsv,
  quoteField,
  sortedEvents,
  type ExportSource,
  type Formatter,
} from './formatters';
export { exportTimeline, resolveExportFormat, type ExportOptions } from './exportTimeline';
