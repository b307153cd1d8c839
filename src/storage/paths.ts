// Path normalization.
//
// Canonical paths are root-relative, '/'-separated, with no empty, '.' or '..'
// segments. The storage root is the empty string.

import { StorageInvalidPathError } from './errors.js';

export const ROOT_PATH = '';

const DRIVE_PREFIX = /^[A-Za-z]:/;
// eslint-disable-next-line no-control-regex -- rejecting control characters is the point
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Canonicalize a caller-supplied path.
 *
 * - `''`, `null`, `undefined`, `'/'` and `'.'` all mean the root.
 * - Backslashes are treated as separators; repeated separators collapse.
 * - A single leading separator is allowed and dropped.
 *
 * Throws StorageInvalidPathError for '..' segments, drive letters, UNC
 * prefixes and control characters. Pure: no I/O.
 */
export function normalizePath(path: string | null | undefined): string {
  if (path === null || path === undefined || path === '') {
    return ROOT_PATH;
  }

  if (CONTROL_CHARS.test(path)) {
    throw new StorageInvalidPathError(path, 'control characters are not allowed');
  }

  const unified = path.replace(/\\/g, '/');

  if (DRIVE_PREFIX.test(unified)) {
    throw new StorageInvalidPathError(path, 'drive-qualified paths are not allowed');
  }
  if (unified.startsWith('//')) {
    throw new StorageInvalidPathError(path, 'network paths are not allowed');
  }

  const segments: string[] = [];
  for (const segment of unified.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      throw new StorageInvalidPathError(path, 'parent directory segments are not allowed');
    }
    segments.push(segment);
  }

  return segments.join('/');
}

/** Parent of a canonical path ('' for top-level entries and the root itself). */
export function parentPath(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? ROOT_PATH : path.slice(0, index);
}

/** Last segment of a canonical path ('' for the root). */
export function baseName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/** Join a canonical directory path and an entry name. */
export function joinPath(directory: string, name: string): string {
  return directory === ROOT_PATH ? name : `${directory}/${name}`;
}

/**
 * Every ancestor directory of a canonical path, outermost first, excluding the
 * root. `ancestorPaths('a/b/c.txt')` is `['a', 'a/b']`.
 */
export function ancestorPaths(path: string): string[] {
  const segments = path.split('/').slice(0, -1);
  return segments.map((_, i) => segments.slice(0, i + 1).join('/'));
}
