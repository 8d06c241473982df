/**
 * In-Memory File System
 *
 * FileSystem adapter holding files in a Map. Paths are POSIX-normalized;
 * the root directory always exists. Used by tests and by embedders that
 * want to keep exports in memory.
 */

import { posix } from 'node:path';
import { TimelineIOError, type IOOperation } from '@/core/errors';
import { describeSystemError, type FileSystem } from './fileSystem';

type FileContent = string | Uint8Array;

export interface MemoryFileSystemOptions {
  /** Directories that exist up front (ancestors are created too) */
  directories?: readonly string[];
  /** Files that exist up front; their directories are created */
  files?: Readonly<Record<string, FileContent>>;
}

export class MemoryFileSystem implements FileSystem {
  private readonly _files = new Map<string, FileContent>();
  private readonly _directories = new Set<string>(['/']);
  private readonly _readOnly = new Set<string>();

  constructor(options: MemoryFileSystemOptions = {}) {
    for (const dir of options.directories ?? []) {
      this.mkdir(dir, { recursive: true });
    }
    for (const [path, content] of Object.entries(options.files ?? {})) {
      const normalized = normalize(path);
      this.mkdir(posix.dirname(normalized), { recursive: true });
      this._files.set(normalized, content);
    }
  }

  // ---------------------------------------------------------------------------
  // FileSystem
  // ---------------------------------------------------------------------------

  readTextFile(path: string): string {
    const normalized = normalize(path);
    if (this._directories.has(normalized)) {
      throw ioError('read', path, 'EISDIR');
    }
    const content = this._files.get(normalized);
    if (content === undefined) {
      throw ioError('read', path, 'ENOENT');
    }
    return typeof content === 'string' ? content : new TextDecoder().decode(content);
  }

  writeTextFile(path: string, content: string): void {
    this._write(path, content);
  }

  writeBinaryFile(path: string, data: Uint8Array): void {
    this._write(path, new Uint8Array(data));
  }

  exists(path: string): boolean {
    const normalized = normalize(path);
    return this._files.has(normalized) || this._directories.has(normalized);
  }

  mkdir(path: string, options?: { recursive?: boolean }): void {
    const normalized = normalize(path);
    if (this._directories.has(normalized)) {
      if (options?.recursive) return;
      throw ioError('mkdir', path, 'EEXIST');
    }
    if (this._files.has(normalized)) {
      throw ioError('mkdir', path, 'EEXIST');
    }

    const parent = posix.dirname(normalized);
    if (!this._directories.has(parent)) {
      if (!options?.recursive) {
        throw ioError('mkdir', path, 'ENOENT');
      }
      this.mkdir(parent, { recursive: true });
    }
    this._directories.add(normalized);
  }

  // ---------------------------------------------------------------------------
  // Inspection (tests)
  // ---------------------------------------------------------------------------

  /** Raw stored content, or undefined */
  getFile(path: string): FileContent | undefined {
    return this._files.get(normalize(path));
  }

  /** Sorted list of all file paths */
  listFiles(): string[] {
    return [...this._files.keys()].sort();
  }

  /** Make every write at or below `path` fail with EACCES */
  setReadOnly(path: string): void {
    this._readOnly.add(normalize(path));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private _write(path: string, content: FileContent): void {
    const normalized = normalize(path);
    if (this._directories.has(normalized)) {
      throw ioError('write', path, 'EISDIR');
    }
    if (!this._directories.has(posix.dirname(normalized))) {
      throw ioError('write', path, 'ENOENT');
    }
    if (this._isReadOnly(normalized)) {
      throw ioError('write', path, 'EACCES');
    }
    this._files.set(normalized, content);
  }

  private _isReadOnly(normalized: string): boolean {
    for (const locked of this._readOnly) {
      if (normalized === locked || normalized.startsWith(`${locked}/`)) {
        return true;
      }
    }
    return false;
  }
}

function normalize(path: string): string {
  return posix.normalize(posix.resolve('/', path));
}

function ioError(operation: IOOperation, path: string, systemCode: string): TimelineIOError {
  return new TimelineIOError(operation, path, describeSystemError(systemCode), { systemCode });
}
