/**
 * Error Message Utilities
 *
 * Converts errors from the timeline core into user-friendly messages.
 */

import {
  describeIssues,
  FormatError,
  TimelineIOError,
  UnsupportedFormatError,
  ValidationError,
  isTimelineError,
} from '@/core/errors';
import { createLogger } from '@/services/logger';

const logger = createLogger('ErrorMessages');

// =============================================================================
// Error Message Mapping
// =============================================================================

/** Patterns for errors that arrive as plain messages */
const ERROR_PATTERNS: Array<{
  pattern: RegExp;
  message: (matches: RegExpMatchArray) => string;
}> = [
  {
    pattern: /Unexpected token|JSON/i,
    message: () => 'The test file is not valid JSON.',
  },
  {
    pattern: /no such file or directory|ENOENT/i,
    message: () => 'The file or folder could not be found. Please check the path.',
  },
  {
    pattern: /Permission denied|EACCES|EPERM/i,
    message: () => 'Access denied. Check file permissions.',
  },
  {
    pattern: /Unsupported export format: (.+)/i,
    message: (matches) => `"${matches[1]}" is not a supported export format.`,
  },
];

function describeIOError(error: TimelineIOError): string {
  switch (error.systemCode) {
    case 'ENOENT':
      return error.operation === 'read'
        ? `The file ${error.path} could not be found.`
        : `The folder for ${error.path} does not exist.`;
    case 'EACCES':
    case 'EPERM':
      return `Access denied to ${error.path}. Check file permissions.`;
    case 'EISDIR':
      return `${error.path} is a folder, not a file.`;
    default:
      return error.operation === 'read'
        ? `Could not read ${error.path}.`
        : `Could not write ${error.path}.`;
  }
}

/** Issues named in a damaged-file message; the rest are counted */
const MAX_LISTED_ISSUES = 3;

function describeFormatError(error: FormatError): string {
  const base = 'The test file is damaged or not a stimulus timeline';
  if (error.issues.length === 0) {
    return `${base}.`;
  }
  const listed = describeIssues(error.issues.slice(0, MAX_LISTED_ISSUES));
  const remaining = error.issues.length - MAX_LISTED_ISSUES;
  return remaining > 0 ? `${base} (${listed}; ${remaining} more).` : `${base} (${listed}).`;
}

// =============================================================================
// Functions
// =============================================================================

/**
 * Convert an error to a message suitable for a dialog or the CLI.
 */
export function getUserFriendlyError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Please fix the ${error.subject} settings: ${error.issues.map((issue) => issue.message).join('; ')}`;
  }
  if (error instanceof FormatError) {
    return describeFormatError(error);
  }
  if (error instanceof UnsupportedFormatError) {
    return `"${error.format}" is not a supported export format.`;
  }
  if (error instanceof TimelineIOError) {
    return describeIOError(error);
  }

  const errorStr = error instanceof Error ? error.message : String(error);

  for (const { pattern, message } of ERROR_PATTERNS) {
    const matches = errorStr.match(pattern);
    if (matches) {
      return message(matches);
    }
  }

  if (process.env.NODE_ENV === 'development') {
    return `An error occurred: ${errorStr}`;
  }

  return 'An unexpected error occurred. Please try again.';
}

/**
 * Recoverable errors (bad input the user can correct) are warnings.
 */
export function getErrorSeverity(error: unknown): 'error' | 'warning' {
  if (isTimelineError(error)) {
    return error.recoverable ? 'warning' : 'error';
  }
  return 'error';
}

/**
 * Create an error handler that routes messages by severity.
 */
export function createErrorHandler(
  showError: (message: string) => void,
  showWarning: (message: string) => void
): (error: unknown) => void {
  return (error: unknown) => {
    const message = getUserFriendlyError(error);
    const severity = getErrorSeverity(error);

    if (severity === 'warning') {
      showWarning(message);
    } else {
      showError(message);
    }

    logger.error('Handled error', { error });
  };
}
