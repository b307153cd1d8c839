// FileInfo construction and directory listing composition.

import { baseName, joinPath } from './paths.js';
import type { DirectoryContents, FileInfo } from './types.js';

/** One child as reported by a backend enumeration. */
export interface ListingEntry {
  kind: 'file' | 'directory';
  name: string;
  length?: number;
  lastModified?: Date;
}

export function fileInfo(path: string, length: number, lastModified?: Date): FileInfo {
  return Object.freeze({
    name: baseName(path),
    path,
    exists: true,
    isDirectory: false,
    length,
    ...(lastModified && { lastModified }),
  });
}

export function directoryInfo(path: string, lastModified?: Date): FileInfo {
  return Object.freeze({
    name: baseName(path),
    path,
    exists: true,
    isDirectory: true,
    length: 0,
    ...(lastModified && { lastModified }),
  });
}

export function missingInfo(path: string): FileInfo {
  return Object.freeze({
    name: baseName(path),
    path,
    exists: false,
    isDirectory: false,
    length: 0,
  });
}

/**
 * Combine a directory existence probe with its enumeration.
 *
 * The probe is authoritative: when it reports the directory absent, the result
 * is `{ exists: false, entries: [] }` whatever the enumeration returned.
 * Entries keep enumeration order and are classified by the backend-reported
 * kind only.
 */
export function composeDirectoryContents(
  path: string,
  exists: boolean,
  entries: readonly ListingEntry[]
): DirectoryContents {
  if (!exists) {
    return Object.freeze({ path, exists: false, entries: Object.freeze([]) });
  }

  const infos = entries.map((entry) => {
    const entryPath = joinPath(path, entry.name);
    return entry.kind === 'directory'
      ? directoryInfo(entryPath, entry.lastModified)
      : fileInfo(entryPath, entry.length ?? 0, entry.lastModified);
  });

  return Object.freeze({ path, exists: true, entries: Object.freeze(infos) });
}
