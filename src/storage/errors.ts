import { PassThrough, addAbortSignal, type Readable } from 'node:stream';

import createError from '@fastify/error';

// Storage errors (STORAGE_*)
//
// The closed set of failures the storage layer reports. Backend-native errors
// (Azure RestError, Node fs errors, aborts) are translated into one of these
// before leaving a backend adapter.

export type StorageErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InvalidPath'
  | 'BackendUnavailable'
  | 'Unknown';

/** Path does not exist where the operation requires it (404) */
export const StorageNotFoundError = createError<[string]>(
  'STORAGE_NOT_FOUND',
  'Path not found: %s',
  404
);

/** Target already exists and overwriting is disabled, or a provisioned root clashed (409) */
export const StorageAlreadyExistsError = createError<[string]>(
  'STORAGE_ALREADY_EXISTS',
  'Path already exists: %s',
  409
);

/** Path failed normalization; raised before any backend call (400) */
export const StorageInvalidPathError = createError<[string, string]>(
  'STORAGE_INVALID_PATH',
  'Invalid path "%s": %s',
  400
);

/** Backend unreachable, throttled, timed out, or the call was cancelled (503) */
export const StorageBackendUnavailableError = createError<[string, string]>(
  'STORAGE_BACKEND_UNAVAILABLE',
  'Storage backend unavailable during %s: %s',
  503
);

/** Any other backend failure, carrying the backend detail (502) */
export const StorageUnknownError = createError<[string, string]>(
  'STORAGE_UNKNOWN',
  'Storage operation %s failed: %s',
  502
);

const KIND_BY_CODE = new Map<string, StorageErrorKind>([
  ['STORAGE_NOT_FOUND', 'NotFound'],
  ['STORAGE_ALREADY_EXISTS', 'AlreadyExists'],
  ['STORAGE_INVALID_PATH', 'InvalidPath'],
  ['STORAGE_BACKEND_UNAVAILABLE', 'BackendUnavailable'],
  ['STORAGE_UNKNOWN', 'Unknown'],
]);

/**
 * Kind of a storage error, or undefined when the value is not one.
 * Callers branch on this rather than on error classes.
 */
export function storageErrorKind(error: unknown): StorageErrorKind | undefined {
  const code = errorCode(error);
  return code === undefined ? undefined : KIND_BY_CODE.get(code);
}

// ---- Backend error classification ----

/** Backend codes that mean "the resource is not there". */
const NOT_FOUND_CODES = new Set([
  'ResourceNotFound',
  'ParentNotFound',
  'ShareNotFound',
  'ENOENT',
  'ENOTDIR',
]);

const ALREADY_EXISTS_CODES = new Set(['ShareAlreadyExists', 'ResourceAlreadyExists', 'EEXIST']);

/** Transport-level codes that mean the backend could not be reached in time. */
const UNAVAILABLE_CODES = new Set([
  'REQUEST_SEND_ERROR',
  'ServerBusy',
  'OperationTimedOut',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
]);

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Azure storage responses also carry the service code in details.errorCode
  if (
    'details' in error &&
    typeof error.details === 'object' &&
    error.details !== null &&
    'errorCode' in error.details &&
    typeof error.details.errorCode === 'string'
  ) {
    return error.details.errorCode;
  }
  return undefined;
}

function errorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || errorCode(error) === 'ABORT_ERR');
}

/**
 * Whether a backend-native error signals absence.
 * Azure reports 404 with ResourceNotFound/ParentNotFound; Node fs uses ENOENT.
 */
export function isNotFoundError(error: unknown): boolean {
  const code = errorCode(error);
  if (code !== undefined && (NOT_FOUND_CODES.has(code) || code === 'STORAGE_NOT_FOUND')) {
    return true;
  }
  return errorStatus(error) === 404;
}

/**
 * Map any thrown value to exactly one storage error.
 *
 * @param operation - Operation label for the message (e.g. 'copy')
 * @param path - Canonical path the NotFound/AlreadyExists message refers to
 */
export function translateStorageError(error: unknown, operation: string, path: string): Error {
  if (storageErrorKind(error) !== undefined && error instanceof Error) {
    return error;
  }

  if (isAbort(error)) {
    return new StorageBackendUnavailableError(operation, 'operation was cancelled');
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new StorageBackendUnavailableError(operation, 'operation timed out');
  }

  if (isNotFoundError(error)) {
    return new StorageNotFoundError(path);
  }

  const code = errorCode(error);
  const status = errorStatus(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (code !== undefined && ALREADY_EXISTS_CODES.has(code)) {
    return new StorageAlreadyExistsError(path);
  }

  if (
    (code !== undefined && UNAVAILABLE_CODES.has(code)) ||
    status === 408 ||
    status === 429 ||
    (status !== undefined && status >= 500)
  ) {
    return new StorageBackendUnavailableError(operation, detail);
  }

  return new StorageUnknownError(operation, code ? `${code}: ${detail}` : detail);
}

/** Fail with a cancelled BackendUnavailable once `signal` has fired, whatever its reason. */
export function throwIfCancelled(operation: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new StorageBackendUnavailableError(operation, 'operation was cancelled');
  }
}

/**
 * Run a backend call and translate whatever it throws.
 * Checks the signal first so a cancelled call performs no I/O.
 */
export async function withTranslation<T>(
  operation: string,
  path: string,
  signal: AbortSignal | undefined,
  fn: () => Promise<T>
): Promise<T> {
  throwIfCancelled(operation, signal);
  try {
    return await fn();
  } catch (error) {
    throw translateStorageError(error, operation, path);
  }
}

/**
 * Hand out a backend read stream whose errors are translated like those of
 * withTranslation. Destroying the returned stream destroys the source, and an
 * abort of `signal` fails the read as cancelled.
 */
export function translateStreamErrors(
  source: Readable,
  operation: string,
  path: string,
  signal?: AbortSignal
): Readable {
  const output = new PassThrough();
  source.on('error', (error) => {
    output.destroy(translateStorageError(error, operation, path));
  });
  output.on('close', () => {
    source.destroy();
  });
  if (signal) {
    addAbortSignal(signal, source);
  }
  source.pipe(output);
  return output;
}
