/**
 * Error Messages Utility Tests
 *
 * Tests for user-friendly error message conversion.
 */

import { describe, it, expect, vi } from 'vitest';
import { FormatError, TimelineIOError, UnsupportedFormatError, ValidationError } from '@/core/errors';
import { getLogHistory, LogLevel } from '@/services/logger';
import { createErrorHandler, getErrorSeverity, getUserFriendlyError } from './errorMessages';

// =============================================================================
// getUserFriendlyError Tests
// =============================================================================

describe('getUserFriendlyError', () => {
  describe('Timeline Errors', () => {
    it('should list validation messages', () => {
      const error = new ValidationError([
        { path: 'onsetMs', message: 'Onset must be >= 0' },
        { path: 'payload.volume', message: 'Volume must be between 0.0 and 1.0' },
      ]);

      expect(getUserFriendlyError(error)).toBe(
        'Please fix the stimulus settings: Onset must be >= 0; Volume must be between 0.0 and 1.0'
      );
    });

    it('should name the broken fields of damaged files', () => {
      const error = new FormatError([{ path: 'events.0.timestamp_ms', message: 'Required' }]);

      expect(getUserFriendlyError(error)).toBe(
        'The test file is damaged or not a stimulus timeline (events.0.timestamp_ms: Required).'
      );
    });

    it('should list at most three broken fields', () => {
      const error = new FormatError([
        { path: 'events.0.timestamp_ms', message: 'Required' },
        { path: 'events.1.data.file_path', message: 'Required' },
        { path: 'events.2.event_type', message: 'Invalid discriminator value' },
        { path: 'events.3.data.duration_ms', message: 'Required' },
        { path: 'metadata.name', message: 'Expected string' },
      ]);

      expect(getUserFriendlyError(error)).toBe(
        'The test file is damaged or not a stimulus timeline (events.0.timestamp_ms: Required; ' +
          'events.1.data.file_path: Required; events.2.event_type: Invalid discriminator value; 2 more).'
      );
    });

    it('should name the missing save location', () => {
      const error = new ValidationError([{ path: 'filePath', message: 'Choose where to save the test' }], 'test');

      expect(getUserFriendlyError(error)).toBe('Please fix the test settings: Choose where to save the test');
    });

    it('should quote unsupported formats', () => {
      expect(getUserFriendlyError(new UnsupportedFormatError('xlsx'))).toBe('"xlsx" is not a supported export format.');
    });
  });

  describe('File System Errors', () => {
    it('should describe a missing file on read', () => {
      const error = new TimelineIOError('read', '/tests/a.json', 'no such file or directory', { systemCode: 'ENOENT' });

      expect(getUserFriendlyError(error)).toBe('The file /tests/a.json could not be found.');
    });

    it('should describe a missing folder on write', () => {
      const error = new TimelineIOError('write', '/nope/a.csv', 'no such file or directory', { systemCode: 'ENOENT' });

      expect(getUserFriendlyError(error)).toBe('The folder for /nope/a.csv does not exist.');
    });

    it('should describe permission problems', () => {
      const error = new TimelineIOError('write', '/locked/a.csv', 'permission denied', { systemCode: 'EPERM' });

      expect(getUserFriendlyError(error)).toBe('Access denied to /locked/a.csv. Check file permissions.');
    });

    it('should describe directories given as files', () => {
      const error = new TimelineIOError('read', '/tests', 'is a directory', { systemCode: 'EISDIR' });

      expect(getUserFriendlyError(error)).toBe('/tests is a folder, not a file.');
    });

    it('should fall back to the operation', () => {
      const error = new TimelineIOError('write', '/disk/a.csv', 'no space left', { systemCode: 'ENOSPC' });

      expect(getUserFriendlyError(error)).toBe('Could not write /disk/a.csv.');
    });
  });

  describe('Plain Errors', () => {
    it('should recognize JSON parse failures', () => {
      expect(getUserFriendlyError(new SyntaxError('Unexpected token } in JSON at position 4'))).toBe(
        'The test file is not valid JSON.'
      );
    });

    it('should recognize missing paths', () => {
      expect(getUserFriendlyError(new Error('ENOENT: open /x'))).toBe(
        'The file or folder could not be found. Please check the path.'
      );
    });

    it('should recognize permission messages', () => {
      expect(getUserFriendlyError('Permission denied')).toBe('Access denied. Check file permissions.');
    });

    it('should extract the format from plain messages', () => {
      expect(getUserFriendlyError(new Error('Unsupported export format: docx'))).toBe(
        '"docx" is not a supported export format.'
      );
    });
  });

  describe('Fallback', () => {
    it('should hide unknown messages outside development', () => {
      vi.stubEnv('NODE_ENV', 'production');

      expect(getUserFriendlyError(new Error('boom'))).toBe('An unexpected error occurred. Please try again.');
    });

    it('should show the raw message in development', () => {
      vi.stubEnv('NODE_ENV', 'development');

      expect(getUserFriendlyError(new Error('boom'))).toBe('An error occurred: boom');
    });
  });
});

// =============================================================================
// getErrorSeverity Tests
// =============================================================================

describe('getErrorSeverity', () => {
  it('should treat recoverable timeline errors as warnings', () => {
    expect(getErrorSeverity(new ValidationError([]))).toBe('warning');
    expect(getErrorSeverity(new UnsupportedFormatError('x'))).toBe('warning');
  });

  it('should treat everything else as errors', () => {
    expect(getErrorSeverity(new FormatError([]))).toBe('error');
    expect(getErrorSeverity(new Error('boom'))).toBe('error');
    expect(getErrorSeverity('boom')).toBe('error');
  });
});

// =============================================================================
// createErrorHandler Tests
// =============================================================================

describe('createErrorHandler', () => {
  it('should route warnings and errors', () => {
    const showError = vi.fn();
    const showWarning = vi.fn();
    const handle = createErrorHandler(showError, showWarning);

    handle(new UnsupportedFormatError('xlsx'));
    handle(new FormatError([]));

    expect(showWarning).toHaveBeenCalledWith('"xlsx" is not a supported export format.');
    expect(showError).toHaveBeenCalledWith('The test file is damaged or not a stimulus timeline.');
  });

  it('should log every handled error', () => {
    const handle = createErrorHandler(vi.fn(), vi.fn());

    handle(new Error('boom'));

    const entries = getLogHistory(LogLevel.ERROR);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.module).toBe('ErrorMessages');
    expect(entries[0]?.message).toBe('Handled error');
  });
});
