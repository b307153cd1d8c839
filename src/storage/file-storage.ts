// FileStorage facade: the public entry point of the storage layer.

import { Readable } from 'node:stream';

import type { FastifyBaseLogger } from 'fastify';

import {
  StorageAlreadyExistsError,
  StorageBackendUnavailableError,
  StorageInvalidPathError,
  StorageNotFoundError,
} from './errors.js';
import { ROOT_PATH, normalizePath } from './paths.js';
import type { DirectoryContents, FileInfo, OperationOptions, StorageBackend } from './types.js';

export interface FileStorageOptions {
  backend: StorageBackend;
  logger: FastifyBaseLogger;
  /** Replace existing targets on copy/rename (default true) */
  overwrite?: boolean;
  /** Removes backend resources provisioned for this handle; run once by release() */
  cleanup?: () => Promise<void>;
}

/**
 * Path-validating, lifecycle-owning wrapper around one StorageBackend.
 *
 * Paths are normalized before any backend call, so invalid paths fail with
 * STORAGE_INVALID_PATH without I/O. Operations carry no per-call state and
 * may run concurrently. After release() every operation fails with
 * STORAGE_BACKEND_UNAVAILABLE.
 */
export class FileStorage {
  private readonly backend: StorageBackend;
  private readonly log: FastifyBaseLogger;
  private readonly overwrite: boolean;
  private readonly cleanup: (() => Promise<void>) | undefined;
  private releasing: Promise<void> | null = null;

  constructor(options: FileStorageOptions) {
    this.backend = options.backend;
    this.log = options.logger;
    this.overwrite = options.overwrite ?? true;
    this.cleanup = options.cleanup;
  }

  get backendKind(): StorageBackend['kind'] {
    return this.backend.kind;
  }

  get released(): boolean {
    return this.releasing !== null;
  }

  async copyFile(source: string, target: string, options?: OperationOptions): Promise<void> {
    const from = this.filePath('copyFile', source);
    const to = this.filePath('copyFile', target);
    await this.guardTarget(from, to, options);
    await this.backend.copy(from, to, options);
  }

  async deleteFile(path: string, options?: OperationOptions): Promise<void> {
    await this.backend.delete(this.filePath('deleteFile', path), options);
  }

  async renameFile(source: string, target: string, options?: OperationOptions): Promise<void> {
    const from = this.filePath('renameFile', source);
    const to = this.filePath('renameFile', target);
    await this.guardTarget(from, to, options);
    await this.backend.rename(from, to, options);
  }

  /** The caller owns the returned stream and must consume or destroy it. */
  async getFileStream(path: string, options?: OperationOptions): Promise<Readable> {
    return this.backend.getStream(this.filePath('getFileStream', path), options);
  }

  async saveFile(
    path: string,
    content: Readable | Buffer | Uint8Array | string,
    options?: OperationOptions
  ): Promise<void> {
    const target = this.filePath('saveFile', path);
    await this.backend.save(target, toStream(content), options);
  }

  async getDirectoryContents(path: string, options?: OperationOptions): Promise<DirectoryContents> {
    return this.backend.list(this.anyPath('getDirectoryContents', path), options);
  }

  async getFileInfo(path: string, options?: OperationOptions): Promise<FileInfo> {
    return this.backend.stat(this.anyPath('getFileInfo', path), options);
  }

  async healthy(): Promise<boolean> {
    return !this.released && (await this.backend.healthy());
  }

  /**
   * Release the handle. Idempotent: later calls return the first call's promise.
   * Cleanup failures are logged and discarded, never thrown.
   */
  release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.runCleanup();
    }
    return this.releasing;
  }

  private async runCleanup(): Promise<void> {
    if (!this.cleanup) return;
    try {
      await this.cleanup();
      this.log.info({ backend: this.backend.kind }, 'Storage resources released');
    } catch (error) {
      this.log.warn(
        { backend: this.backend.kind, err: error instanceof Error ? error.message : 'Unknown error' },
        'Storage cleanup failed; continuing'
      );
    }
  }

  private anyPath(operation: string, path: string): string {
    if (this.released) {
      throw new StorageBackendUnavailableError(operation, 'storage handle has been released');
    }
    return normalizePath(path);
  }

  private filePath(operation: string, path: string): string {
    const canonical = this.anyPath(operation, path);
    if (canonical === ROOT_PATH) {
      throw new StorageInvalidPathError(path, 'a file path is required');
    }
    return canonical;
  }

  /** A missing source wins over an existing target, so NotFound is reported first. */
  private async guardTarget(source: string, target: string, options?: OperationOptions): Promise<void> {
    if (this.overwrite || source === target) return;
    const [from, to] = await Promise.all([
      this.backend.stat(source, options),
      this.backend.stat(target, options),
    ]);
    if (!from.exists || from.isDirectory) {
      throw new StorageNotFoundError(source);
    }
    if (to.exists) {
      throw new StorageAlreadyExistsError(target);
    }
  }
}

function toStream(content: Readable | Buffer | Uint8Array | string): Readable {
  if (content instanceof Readable) return content;
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
  return Readable.from([bytes]);
}
