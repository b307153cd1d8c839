import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Request errors (REQUEST_*)
export const RequestBodyMissingError = createError<[string]>(
  'REQUEST_BODY_MISSING',
  'Request body missing: %s',
  400
);

// Storage errors (STORAGE_*) - re-exported from storage domain
export {
  StorageNotFoundError,
  StorageAlreadyExistsError,
  StorageInvalidPathError,
  StorageBackendUnavailableError,
  StorageUnknownError,
  storageErrorKind,
} from '../storage/errors.js';
export type { StorageErrorKind } from '../storage/errors.js';
