/**
 * Stimulus Timeline - Custom Errors
 *
 * Every failure the core surfaces is one of these classes, so callers can
 * branch on `code` (or `instanceof`) and show `message` to the user.
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for all timeline errors
 */
export abstract class TimelineError extends Error {
  /** Error code for programmatic handling */
  abstract readonly code: string;
  /** Whether retrying with corrected input can succeed */
  abstract readonly recoverable: boolean;
  /** Timestamp when error occurred */
  readonly timestamp: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = Date.now();

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Field / Structure Errors
// =============================================================================

/**
 * A single offending field
 */
export interface ErrorIssue {
  /** Dotted path of the field (`events.2.data.volume`), empty for the root */
  path: string;
  message: string;
}

/** `path: message` pairs joined with `; ` */
export function describeIssues(issues: readonly ErrorIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * A field violates its documented range (negative onset, volume > 1, ...)
 * or a required value is missing
 */
export class ValidationError extends TimelineError {
  readonly code = 'VALIDATION_FAILED';
  readonly recoverable = true;
  readonly issues: readonly ErrorIssue[];
  /** What was being checked: `stimulus` for event input, `test` for the test as a whole */
  readonly subject: string;

  constructor(issues: readonly ErrorIssue[], subject: string = 'stimulus') {
    super(`Invalid ${subject}: ${describeIssues(issues)}`);
    this.issues = issues;
    this.subject = subject;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

/**
 * Structured data on load is malformed or incomplete
 */
export class FormatError extends TimelineError {
  readonly code = 'FORMAT_INVALID';
  readonly recoverable = false;
  readonly issues: readonly ErrorIssue[];

  constructor(issues: readonly ErrorIssue[], options?: ErrorOptions) {
    super(`Malformed timeline data: ${describeIssues(issues)}`, options);
    this.issues = issues;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

// =============================================================================
// Export Errors
// =============================================================================

/**
 * Export format selector matches no known formatter
 */
export class UnsupportedFormatError extends TimelineError {
  readonly code = 'UNSUPPORTED_FORMAT';
  readonly recoverable = true;
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported export format: ${format}`);
    this.format = format;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      format: this.format,
    };
  }
}

// =============================================================================
// File System Errors
// =============================================================================

export type IOOperation = 'read' | 'write' | 'mkdir';

/**
 * File system failure on save, load or export
 */
export class TimelineIOError extends TimelineError {
  readonly code = 'IO_FAILED';
  readonly recoverable = false;
  readonly path: string;
  readonly operation: IOOperation;
  /** Underlying system error code (ENOENT, EACCES, ...) when known */
  readonly systemCode?: string;

  constructor(operation: IOOperation, path: string, reason: string, options?: ErrorOptions & { systemCode?: string }) {
    super(`Failed to ${operation} ${path}: ${reason}`, options);
    this.operation = operation;
    this.path = path;
    this.systemCode = options?.systemCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      path: this.path,
      systemCode: this.systemCode,
    };
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a TimelineError
 */
export function isTimelineError(error: unknown): error is TimelineError {
  return error instanceof TimelineError;
}
