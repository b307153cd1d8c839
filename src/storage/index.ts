// Storage module barrel export and factory functions.

import { randomUUID } from 'node:crypto';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import { createAzureShareRoot, createShareServiceClient } from './azure-share.js';
import type { StorageConfig } from './config.js';
import { withTranslation } from './errors.js';
import { FileStorage } from './file-storage.js';
import { FsBackend } from './fs-backend.js';
import { ShareBackend } from './share-backend.js';
import type { ShareRoot } from './share-types.js';

export type { DirectoryContents, FileInfo, OperationOptions, StorageBackend } from './types.js';
export type { StorageConfig, AzureStorageConfig } from './config.js';
export type { StorageErrorKind } from './errors.js';
export type { ListingEntry } from './listing.js';
export type {
  ShareCallOptions,
  ShareCopyStatus,
  ShareDirectoryRef,
  ShareFileRef,
  ShareListItem,
  ShareRoot,
} from './share-types.js';
export { StorageConfigSchema, AzureStorageConfigSchema } from './config.js';
export {
  StorageNotFoundError,
  StorageAlreadyExistsError,
  StorageInvalidPathError,
  StorageBackendUnavailableError,
  StorageUnknownError,
  storageErrorKind,
  translateStorageError,
} from './errors.js';
export { normalizePath, ROOT_PATH } from './paths.js';
export { composeDirectoryContents } from './listing.js';
export { FileStorage } from './file-storage.js';
export { FsBackend } from './fs-backend.js';
export { ShareBackend } from './share-backend.js';
export { AzureShareRoot, createShareServiceClient } from './azure-share.js';

export interface ShareStorageOptions {
  share: ShareRoot;
  logger: FastifyBaseLogger;
  /** Create the share exclusively and delete it on release */
  ephemeral?: boolean;
  overwrite?: boolean;
  copyPollIntervalMs?: number;
  copyTimeoutMs?: number;
}

/**
 * Provision a share and wrap it in a FileStorage handle.
 *
 * A named share is created if absent. An ephemeral share must not exist yet
 * (STORAGE_ALREADY_EXISTS otherwise) and is deleted, best effort, on release.
 */
export async function openShareStorage(options: ShareStorageOptions): Promise<FileStorage> {
  const { share, logger, ephemeral = false } = options;

  await withTranslation('provision', share.name, undefined, async () => {
    if (ephemeral) {
      await share.create();
    } else {
      await share.createIfNotExists();
    }
  });
  logger.info({ share: share.name, ephemeral }, 'File share ready');

  const backend = new ShareBackend({
    share,
    logger,
    copyPollIntervalMs: options.copyPollIntervalMs,
    copyTimeoutMs: options.copyTimeoutMs,
  });

  return new FileStorage({
    backend,
    logger,
    overwrite: options.overwrite,
    ...(ephemeral && {
      cleanup: async () => {
        await share.deleteIfExists();
      },
    }),
  });
}

/**
 * Open a FileStorage handle for the configured backend.
 * Defaults to FsBackend with './data/files'.
 */
export async function openFileStorage(
  config: StorageConfig,
  logger: FastifyBaseLogger
): Promise<FileStorage> {
  switch (config.backend) {
    case 'azure': {
      if (!config.azure) {
        throw new Error('storage.azure is required for the azure backend');
      }
      const shareName = config.ephemeral
        ? `sharestore-${randomUUID()}`
        : config.azure.shareName ?? 'sharestore';
      const service = createShareServiceClient(config.azure);
      return openShareStorage({
        share: createAzureShareRoot(service, shareName),
        logger,
        ephemeral: config.ephemeral,
        overwrite: config.overwrite,
        copyPollIntervalMs: config.azure.copyPollIntervalMs,
        copyTimeoutMs: config.azure.copyTimeoutMs,
      });
    }
    case 'fs':
    default: {
      const dataDir = config.ephemeral
        ? await mkdtemp(join(tmpdir(), 'sharestore-'))
        : config.fs.dataDir;
      logger.info({ dataDir, ephemeral: config.ephemeral }, 'Filesystem storage ready');

      return new FileStorage({
        backend: new FsBackend(dataDir),
        logger,
        overwrite: config.overwrite,
        ...(config.ephemeral && {
          cleanup: () => rm(dataDir, { recursive: true, force: true }),
        }),
      });
    }
  }
}
