// Cloud file-share backend adapter.
//
// Implements the StorageBackend contract over the ShareRoot collaborator:
// - absence is folded into stat()/list() results, raised as NotFound by
//   copy/rename/getStream, and ignored by delete
// - intermediate directories are created before writes
// - server-side copies are polled until the share reports a terminal status
// - rename is copy + delete (the share has no rename primitive)

import { addAbortSignal, type Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import { setTimeout as sleep } from 'node:timers/promises';

import type { FastifyBaseLogger } from 'fastify';

import {
  StorageBackendUnavailableError,
  StorageNotFoundError,
  StorageUnknownError,
  isNotFoundError,
  throwIfCancelled,
  translateStreamErrors,
  withTranslation,
} from './errors.js';
import {
  composeDirectoryContents,
  directoryInfo,
  fileInfo,
  missingInfo,
  type ListingEntry,
} from './listing.js';
import { ROOT_PATH, ancestorPaths } from './paths.js';
import type { ShareCallOptions, ShareCopyStatus, ShareFileRef, ShareRoot } from './share-types.js';
import type { DirectoryContents, FileInfo, OperationOptions, StorageBackend } from './types.js';

// ---- Constants ----

const DEFAULT_COPY_POLL_INTERVAL_MS = 500;
const DEFAULT_COPY_TIMEOUT_MS = 60_000;

export interface ShareBackendOptions {
  share: ShareRoot;
  logger: FastifyBaseLogger;
  copyPollIntervalMs?: number;
  copyTimeoutMs?: number;
}

function callOptions(options?: OperationOptions): ShareCallOptions {
  return options?.signal ? { abortSignal: options.signal } : {};
}

export class ShareBackend implements StorageBackend {
  readonly kind = 'azure' as const;

  private readonly share: ShareRoot;
  private readonly log: FastifyBaseLogger;
  private readonly copyPollIntervalMs: number;
  private readonly copyTimeoutMs: number;

  constructor(options: ShareBackendOptions) {
    this.share = options.share;
    this.log = options.logger;
    this.copyPollIntervalMs = options.copyPollIntervalMs ?? DEFAULT_COPY_POLL_INTERVAL_MS;
    this.copyTimeoutMs = options.copyTimeoutMs ?? DEFAULT_COPY_TIMEOUT_MS;
  }

  async copy(source: string, target: string, options?: OperationOptions): Promise<void> {
    await withTranslation('copy', source, options?.signal, async () => {
      if (source === target) {
        await this.requireFile(source, options);
        return;
      }
      await this.copyFile(source, target, options);
    });
  }

  async delete(path: string, options?: OperationOptions): Promise<void> {
    await withTranslation('delete', path, options?.signal, async () => {
      try {
        const deleted = await this.share.getFile(path).deleteIfExists(callOptions(options));
        this.log.debug({ share: this.share.name, path, deleted }, 'Share file delete');
      } catch (error) {
        // ParentNotFound is not covered by deleteIfExists
        if (!isNotFoundError(error)) throw error;
      }
    });
  }

  /**
   * Copy then delete. Not atomic: a failure or cancellation after the copy
   * leaves both files in place.
   */
  async rename(source: string, target: string, options?: OperationOptions): Promise<void> {
    await withTranslation('rename', source, options?.signal, async () => {
      if (source === target) {
        await this.requireFile(source, options);
        return;
      }

      await this.copyFile(source, target, options);
      try {
        await this.share.getFile(source).deleteIfExists(callOptions(options));
      } catch (error) {
        this.log.warn(
          { share: this.share.name, source, target, err: errorMessage(error) },
          'Rename copied the file but could not delete the source'
        );
        throw error;
      }
    });
  }

  async getStream(path: string, options?: OperationOptions): Promise<Readable> {
    const body = await withTranslation('getStream', path, options?.signal, () =>
      this.share.getFile(path).download(callOptions(options))
    );
    return translateStreamErrors(body, 'getStream', path, options?.signal);
  }

  /**
   * Buffer the input, ensure parent directories, then upload.
   * Shares need the final size when a file is created, so the stream is read
   * to the end first.
   */
  async save(path: string, content: Readable, options?: OperationOptions): Promise<void> {
    await withTranslation('save', path, options?.signal, async () => {
      const input = options?.signal ? addAbortSignal(options.signal, content) : content;
      const data = await buffer(input);
      throwIfCancelled('save', options?.signal);
      await this.ensureDirectories(path, options);
      await this.share.getFile(path).upload(data, callOptions(options));
      this.log.debug({ share: this.share.name, path, size: data.length }, 'Share file saved');
    });
  }

  async stat(path: string, options?: OperationOptions): Promise<FileInfo> {
    return withTranslation('stat', path, options?.signal, async () => {
      const opts = callOptions(options);

      if (path === ROOT_PATH) {
        return (await this.share.exists(opts)) ? directoryInfo(path) : missingInfo(path);
      }

      try {
        const props = await this.share.getFile(path).getProperties(opts);
        return fileInfo(path, props.contentLength, props.lastModified);
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }

      try {
        const props = await this.share.getDirectory(path).getProperties(opts);
        return directoryInfo(path, props.lastModified);
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }

      return missingInfo(path);
    });
  }

  /**
   * Probe and enumerate in parallel. Enumerating a missing directory may
   * return nothing or fail with 404, so the probe decides existence.
   */
  async list(path: string, options?: OperationOptions): Promise<DirectoryContents> {
    return withTranslation('list', path, options?.signal, async () => {
      const directory = this.share.getDirectory(path);
      const opts = callOptions(options);

      const enumerate = async (): Promise<ListingEntry[]> => {
        const entries: ListingEntry[] = [];
        try {
          for await (const item of directory.list(opts)) {
            entries.push({ kind: item.kind, name: item.name, length: item.contentLength });
          }
        } catch (error) {
          if (!isNotFoundError(error)) throw error;
        }
        return entries;
      };

      const [exists, entries] = await Promise.all([directory.exists(opts), enumerate()]);
      return composeDirectoryContents(path, exists, entries);
    });
  }

  async healthy(): Promise<boolean> {
    try {
      return await this.share.exists();
    } catch {
      return false;
    }
  }

  // ---- internals ----

  private async copyFile(source: string, target: string, options?: OperationOptions): Promise<void> {
    const opts = callOptions(options);
    const sourceFile = this.share.getFile(source);

    // Probe first so a missing source leaves no directories behind
    if (!(await sourceFile.exists(opts))) {
      throw new StorageNotFoundError(source);
    }

    await this.ensureDirectories(target, options);

    const targetFile = this.share.getFile(target);
    const status = await targetFile.startCopyFrom(sourceFile, opts);
    await this.waitForCopy(targetFile, status, options);

    this.log.debug({ share: this.share.name, source, target }, 'Share file copied');
  }

  /** Create every missing ancestor directory of `path`, outermost first. */
  private async requireFile(path: string, options?: OperationOptions): Promise<void> {
    if (!(await this.share.getFile(path).exists(callOptions(options)))) {
      throw new StorageNotFoundError(path);
    }
  }

  private async ensureDirectories(path: string, options?: OperationOptions): Promise<void> {
    for (const directory of ancestorPaths(path)) {
      const created = await this.share.getDirectory(directory).createIfNotExists(callOptions(options));
      if (created) {
        this.log.debug({ share: this.share.name, directory }, 'Share directory created');
      }
    }
  }

  private async waitForCopy(
    target: ShareFileRef,
    initial: ShareCopyStatus,
    options?: OperationOptions
  ): Promise<void> {
    const deadline = Date.now() + this.copyTimeoutMs;
    let status = initial;

    while (status === 'pending') {
      if (Date.now() >= deadline) {
        throw new StorageBackendUnavailableError('copy', `copy to ${target.path} did not complete`);
      }
      await sleep(this.copyPollIntervalMs, undefined, { signal: options?.signal });
      const props = await target.getProperties(callOptions(options));
      status = props.copyStatus ?? 'success';
    }

    if (status !== 'success') {
      throw new StorageUnknownError('copy', `copy to ${target.path} ended with status ${status}`);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
