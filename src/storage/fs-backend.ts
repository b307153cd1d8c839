// Filesystem storage backend.
//
// Stores files under a data directory using their canonical paths. Same
// contract as the share backend; rename is a real fs rename here, so it is
// atomic within one volume.

import { createReadStream, createWriteStream, type Dirent } from 'node:fs';
import { mkdir, open, readdir, rename, stat, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import {
  StorageNotFoundError,
  isNotFoundError,
  throwIfCancelled,
  translateStreamErrors,
  withTranslation,
} from './errors.js';
import { composeDirectoryContents, directoryInfo, fileInfo, missingInfo } from './listing.js';
import type { ListingEntry } from './listing.js';
import type { DirectoryContents, FileInfo, OperationOptions, StorageBackend } from './types.js';

export class FsBackend implements StorageBackend {
  readonly kind = 'fs' as const;
  private readonly dataDir: string;
  private initialized = false;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  async copy(source: string, target: string, options?: OperationOptions): Promise<void> {
    await withTranslation('copy', source, options?.signal, async () => {
      await this.requireFile(source);
      // Writing a file onto itself would truncate it before the read
      if (source === target) return;
      await this.ensureParent(target);
      throwIfCancelled('copy', options?.signal);
      await pipeline(
        createReadStream(this.resolve(source)),
        createWriteStream(this.resolve(target)),
        { signal: options?.signal }
      );
    });
  }

  async delete(path: string, options?: OperationOptions): Promise<void> {
    await withTranslation('delete', path, options?.signal, async () => {
      try {
        await unlink(this.resolve(path));
      } catch (error) {
        if (!isNotFoundError(error)) throw error;
      }
    });
  }

  async rename(source: string, target: string, options?: OperationOptions): Promise<void> {
    await withTranslation('rename', source, options?.signal, async () => {
      await this.requireFile(source);
      await this.ensureParent(target);
      throwIfCancelled('rename', options?.signal);
      await rename(this.resolve(source), this.resolve(target));
    });
  }

  async getStream(path: string, options?: OperationOptions): Promise<Readable> {
    const stream = await withTranslation('getStream', path, options?.signal, async () => {
      // Open eagerly so a missing file fails here rather than mid-read
      const handle = await open(this.resolve(path), 'r');
      try {
        const stats = await handle.stat();
        if (!stats.isFile()) {
          throw new StorageNotFoundError(path);
        }
      } catch (error) {
        await handle.close();
        throw error;
      }
      return handle.createReadStream({ autoClose: true });
    });
    return translateStreamErrors(stream, 'getStream', path, options?.signal);
  }

  async save(path: string, content: Readable, options?: OperationOptions): Promise<void> {
    await withTranslation('save', path, options?.signal, async () => {
      await this.ensureParent(path);
      await pipeline(content, createWriteStream(this.resolve(path)), { signal: options?.signal });
    });
  }

  async stat(path: string, options?: OperationOptions): Promise<FileInfo> {
    return withTranslation('stat', path, options?.signal, async () => {
      await this.ensureRoot();
      try {
        const stats = await stat(this.resolve(path));
        return stats.isDirectory()
          ? directoryInfo(path, stats.mtime)
          : fileInfo(path, stats.size, stats.mtime);
      } catch (error) {
        if (isNotFoundError(error)) return missingInfo(path);
        throw error;
      }
    });
  }

  async list(path: string, options?: OperationOptions): Promise<DirectoryContents> {
    return withTranslation('list', path, options?.signal, async () => {
      await this.ensureRoot();
      const directory = this.resolve(path);

      let names: Dirent[];
      try {
        names = await readdir(directory, { withFileTypes: true });
      } catch (error) {
        if (isNotFoundError(error)) return composeDirectoryContents(path, false, []);
        throw error;
      }

      const entries = await Promise.all(
        names
          .filter((dirent) => dirent.isFile() || dirent.isDirectory())
          .map(async (dirent): Promise<ListingEntry | undefined> => {
            if (dirent.isDirectory()) {
              return { kind: 'directory', name: dirent.name };
            }
            try {
              const stats = await stat(join(directory, dirent.name));
              return {
                kind: 'file',
                name: dirent.name,
                length: stats.size,
                lastModified: stats.mtime,
              };
            } catch (error) {
              // Deleted since readdir
              if (isNotFoundError(error)) return undefined;
              throw error;
            }
          })
      );

      return composeDirectoryContents(
        path,
        true,
        entries.filter((entry): entry is ListingEntry => entry !== undefined)
      );
    });
  }

  async healthy(): Promise<boolean> {
    try {
      await this.ensureRoot();
      return true;
    } catch {
      return false;
    }
  }

  // Canonical paths contain no '..' segments, so the join stays inside dataDir
  private resolve(path: string): string {
    return join(this.dataDir, path);
  }

  private async requireFile(path: string): Promise<void> {
    try {
      const stats = await stat(this.resolve(path));
      if (stats.isFile()) return;
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }
    throw new StorageNotFoundError(path);
  }

  private async ensureParent(path: string): Promise<void> {
    await mkdir(dirname(this.resolve(path)), { recursive: true });
  }

  private async ensureRoot(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.dataDir, { recursive: true });
    this.initialized = true;
  }
}
