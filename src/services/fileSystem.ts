/**
 * File System Port
 *
 * The only capability the core consumes from its host. Timeline save/load,
 * exporters, the recent tests list and the tone generator all go through a
 * FileSystem, so tests can hand them a MemoryFileSystem instead of disk.
 *
 * All operations are synchronous and throw TimelineIOError on failure.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { TimelineIOError, type IOOperation } from '@/core/errors';

// =============================================================================
// Port
// =============================================================================

export interface FileSystem {
  /** Read a UTF-8 text file */
  readTextFile(path: string): string;
  /** Create or replace a UTF-8 text file; the parent directory must exist */
  writeTextFile(path: string, content: string): void;
  /** Create or replace a binary file; the parent directory must exist */
  writeBinaryFile(path: string, data: Uint8Array): void;
  /** Whether a file or directory exists at `path` */
  exists(path: string): boolean;
  /** Create a directory; with `recursive`, missing ancestors too and no error if present */
  mkdir(path: string, options?: { recursive?: boolean }): void;
}

// =============================================================================
// Helpers
// =============================================================================

function getSystemCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Human-readable reason for a system error code
 */
export function describeSystemError(code: string | undefined, error?: unknown): string {
  switch (code) {
    case 'ENOENT':
      return 'no such file or directory';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'is a directory';
    case 'ENOTDIR':
      return 'a parent path is not a directory';
    case 'EEXIST':
      return 'already exists';
    default:
      if (error instanceof Error) return error.message;
      return code ?? String(error);
  }
}

/**
 * Run a node:fs call, converting any thrown error into a TimelineIOError
 */
function withIOError<T>(operation: IOOperation, path: string, action: () => T): T {
  try {
    return action();
  } catch (error) {
    const systemCode = getSystemCode(error);
    throw new TimelineIOError(operation, path, describeSystemError(systemCode, error), {
      cause: error,
      systemCode,
    });
  }
}

// =============================================================================
// Node Adapter
// =============================================================================

/**
 * FileSystem backed by node:fs
 */
export const nodeFileSystem: FileSystem = {
  readTextFile(path) {
    return withIOError('read', path, () => readFileSync(path, 'utf-8'));
  },

  writeTextFile(path, content) {
    withIOError('write', path, () => writeFileSync(path, content, 'utf-8'));
  },

  writeBinaryFile(path, data) {
    withIOError('write', path, () => writeFileSync(path, data));
  },

  exists(path) {
    return existsSync(path);
  },

  mkdir(path, options) {
    withIOError('mkdir', path, () => {
      mkdirSync(path, { recursive: options?.recursive ?? false });
    });
  },
};
