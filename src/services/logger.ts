/**
 * Centralized Logging Service
 *
 * Module-scoped loggers with levels, pluggable handlers and a short history
 * buffer for error reports. Nothing is printed until a handler is attached
 * (`initializeLogger()` attaches the console handler).
 *
 * @example
 * ```typescript
 * import { createLogger } from '@/services/logger';
 *
 * const logger = createLogger('Timeline');
 * logger.info('Event added', { eventId });
 * logger.error('Failed to load test', { error });
 * ```
 */

import { getSetting, type LogLevelName } from '@/config/settings';

// =============================================================================
// Types
// =============================================================================

/** Log severity levels */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Structure of a log entry */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  /** Module that created the log */
  module: string;
  message: string;
  /** Additional structured data, with Error values serialized */
  data?: Record<string, unknown>;
}

/** Handler function for processing log entries */
export type LogHandler = (entry: LogEntry) => void;

/** Logger interface */
export interface Logger {
  readonly module: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// =============================================================================
// Constants
// =============================================================================

/** Maximum number of log entries to keep in history buffer */
const MAX_LOG_HISTORY = 100;

/** Maximum depth for recursive normalization */
const MAX_NORMALIZATION_DEPTH = 10;

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

// =============================================================================
// Module State
// =============================================================================

let globalLogLevel: LogLevel = LogLevel.INFO;

const handlers: Set<LogHandler> = new Set();

const logHistory: LogEntry[] = [];

// =============================================================================
// Handler Management
// =============================================================================

export function addLogHandler(handler: LogHandler): void {
  handlers.add(handler);
}

export function removeLogHandler(handler: LogHandler): void {
  handlers.delete(handler);
}

export function clearLogHandlers(): void {
  handlers.clear();
}

// =============================================================================
// Log Level Management
// =============================================================================

/**
 * Set the global log level. Messages below this level are dropped.
 */
export function setGlobalLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Map a configured level name (`'debug'`, `'warn'`, ...) to a LogLevel
 */
export function logLevelFromName(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Serialize an Error into a plain object for logging.
 * Own enumerable properties such as `code` or `path` are kept.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const info: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    for (const [key, value] of Object.entries(error)) {
      if (!(key in info)) {
        info[key] = value;
      }
    }
    return info;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { value: error };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (value instanceof Error) {
    return serializeError(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalizeValue(item, seen, depth + 1));
  }
  if (isPlainRecord(value)) {
    return normalizeLogData(value, seen, depth + 1);
  }
  return value;
}

/**
 * Normalize log data: serialize Errors, cut cycles and runaway nesting.
 */
function normalizeLogData(
  data: Record<string, unknown> | undefined,
  seen: WeakSet<object> = new WeakSet(),
  depth: number = 0
): Record<string, unknown> | undefined {
  if (!data) return undefined;

  if (depth > MAX_NORMALIZATION_DEPTH) {
    return { _truncated: true };
  }
  if (seen.has(data)) {
    return { _circular: true };
  }
  seen.add(data);

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    normalized[key] = normalizeValue(value, seen, depth);
  }
  return normalized;
}

// =============================================================================
// Internal Logging
// =============================================================================

function dispatch(entry: LogEntry): void {
  if (entry.level < globalLogLevel) {
    return;
  }

  logHistory.push(entry);
  if (logHistory.length > MAX_LOG_HISTORY) {
    logHistory.shift();
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (handlerError) {
      // A failing handler must not take the others down; report it directly
      // since routing it through the logger could recurse.
      console.error('[logger] log handler threw', handlerError);
    }
  }
}

function log(module: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  dispatch({
    timestamp: Date.now(),
    level,
    module,
    message,
    data: normalizeLogData(data),
  });
}

// =============================================================================
// Log History Access
// =============================================================================

/**
 * Recent log entries, optionally filtered to a minimum level
 */
export function getLogHistory(level?: LogLevel): readonly LogEntry[] {
  if (level === undefined) {
    return [...logHistory];
  }
  return logHistory.filter((entry) => entry.level >= level);
}

export function clearLogHistory(): void {
  logHistory.length = 0;
}

/**
 * Format a log entry as a single line
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${timestamp}] [${LEVEL_LABELS[entry.level]}] [${entry.module}] ${entry.message}${dataStr}`;
}

/**
 * Export log history as text for error reports
 */
export function exportLogHistory(level?: LogLevel): string {
  return getLogHistory(level).map(formatLogEntry).join('\n');
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create a logger instance for a specific module.
 *
 * @example
 * ```typescript
 * const logger = createLogger('Export');
 * logger.debug('Writing rows', { count: 4 });
 * ```
 */
export function createLogger(moduleName: string = 'App'): Logger {
  return {
    get module(): string {
      return moduleName;
    },
    debug(message, data) {
      log(moduleName, LogLevel.DEBUG, message, data);
    },
    info(message, data) {
      log(moduleName, LogLevel.INFO, message, data);
    },
    warn(message, data) {
      log(moduleName, LogLevel.WARN, message, data);
    },
    error(message, data) {
      log(moduleName, LogLevel.ERROR, message, data);
    },
  };
}

// =============================================================================
// Default Console Handler
// =============================================================================

/**
 * Writes entries to the console, one method per level.
 */
export const consoleHandler: LogHandler = (entry: LogEntry): void => {
  const timestamp = new Date(entry.timestamp).toISOString();
  const formattedMessage = `[${timestamp}] [${entry.module}] ${entry.message}`;
  const data = entry.data ?? '';

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(formattedMessage, data);
      break;
    case LogLevel.INFO:
      console.info(formattedMessage, data);
      break;
    case LogLevel.WARN:
      console.warn(formattedMessage, data);
      break;
    case LogLevel.ERROR:
      console.error(formattedMessage, data);
      break;
    default:
      break;
  }
};

// =============================================================================
// Initialization
// =============================================================================

/**
 * Apply the configured LOG_LEVEL and attach the console handler.
 * Call once at process startup.
 */
export function initializeLogger(): void {
  setGlobalLogLevel(logLevelFromName(getSetting('LOG_LEVEL')));
  addLogHandler(consoleHandler);
}
