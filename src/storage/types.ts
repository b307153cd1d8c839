// Storage abstraction types.
//
// These shapes are the whole caller-facing vocabulary of the storage layer:
// no backend type (Azure responses, fs.Stats, ...) crosses this boundary.

import type { Readable } from 'node:stream';

/**
 * Result of querying a single path.
 * When `exists` is false, `isDirectory` is false and `length` is 0.
 */
export interface FileInfo {
  readonly name: string;
  readonly path: string;
  readonly exists: boolean;
  readonly isDirectory: boolean;
  /** Size in bytes (0 for directories and missing paths) */
  readonly length: number;
  readonly lastModified?: Date;
}

/**
 * Snapshot of a directory listing.
 * `exists: true, entries: []` is an empty directory;
 * `exists: false, entries: []` is a directory that is not there.
 */
export interface DirectoryContents {
  readonly path: string;
  readonly exists: boolean;
  readonly entries: readonly FileInfo[];
}

export interface OperationOptions {
  /** Cancels the operation; an aborted signal fails before any I/O */
  signal?: AbortSignal;
}

/**
 * Per-backend adapter contract. All paths are canonical (see paths.ts).
 * Every failure is one of the storage errors in errors.ts.
 */
export interface StorageBackend {
  /** Backend identifier used in logs and health output */
  readonly kind: 'azure' | 'fs';

  /** Copy a file. Fails with NotFound when the source is missing. Overwrites the target. */
  copy(source: string, target: string, options?: OperationOptions): Promise<void>;

  /** Delete a file. A missing file is not an error. */
  delete(path: string, options?: OperationOptions): Promise<void>;

  /** Move a file. Fails with NotFound when the source is missing. */
  rename(source: string, target: string, options?: OperationOptions): Promise<void>;

  /** Open a file for reading. The caller owns (and must destroy) the stream. */
  getStream(path: string, options?: OperationOptions): Promise<Readable>;

  /** Write a file, creating intermediate directories and replacing existing content. */
  save(path: string, content: Readable, options?: OperationOptions): Promise<void>;

  /** Describe a path. Never fails because the path is missing. */
  stat(path: string, options?: OperationOptions): Promise<FileInfo>;

  /** List a directory. Never fails because the directory is missing. */
  list(path: string, options?: OperationOptions): Promise<DirectoryContents>;

  /** Health check -- returns true if the backend root is reachable */
  healthy(): Promise<boolean>;
}
