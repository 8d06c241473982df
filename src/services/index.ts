/**
 * Services Index
 *
 * Centralized exports for application services.
 */

export {
  createLogger,
  addLogHandler,
  removeLogHandler,
  clearLogHandlers,
  setGlobalLogLevel,
  getGlobalLogLevel,
  logLevelFromName,
  getLogHistory,
  clearLogHistory,
  exportLogHistory,
  formatLogEntry,
  consoleHandler,
  initializeLogger,
  LogLevel,
  type Logger,
  type LogEntry,
  type LogHandler,
} from './logger';

export { nodeFileSystem, describeSystemError, type FileSystem } from './fileSystem';
export { MemoryFileSystem, type MemoryFileSystemOptions } from './memoryFileSystem';

export {
  loadRecentTests,
  addRecentTest,
  removeRecentTest,
  clearRecentTests,
  getRecentTestsPath,
  RECENT_TESTS_FILE,
  type RecentTestsOptions,
} from './recentTests';

export {
  generateTone,
  encodeWav,
  saveTone,
  listFrequencies,
  generateFrequencyRange,
  toneFileName,
  type ToneOptions,
} from './toneGenerator';
