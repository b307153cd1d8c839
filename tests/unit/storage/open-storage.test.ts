import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { openFileStorage, openShareStorage, type StorageConfig } from '@/storage/index.js';

import { createMockLogger } from '../../helpers/logger.js';
import { MemoryShare, ShareServiceError } from '../../helpers/memory-share.js';

describe('openShareStorage', () => {
  let logger: FastifyBaseLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('should create a named share when it is missing and keep it on release', async () => {
    const share = new MemoryShare('files', { provisioned: false });

    const storage = await openShareStorage({ share, logger });
    await storage.saveFile('a.txt', 'hello');
    await storage.release();

    expect(share.provisioned).toBe(true);
    expect(share.readFile('a.txt')).toBe('hello');
    expect(share.calls[0]).toBe('share.createIfNotExists:files');
  });

  it('should reuse an existing named share', async () => {
    const share = new MemoryShare('files');
    share.seedFile('kept.txt', 'old');

    const storage = await openShareStorage({ share, logger });

    expect((await storage.getFileInfo('kept.txt')).exists).toBe(true);
  });

  it('should create an ephemeral share and delete it on release', async () => {
    const share = new MemoryShare('scratch', { provisioned: false });

    const storage = await openShareStorage({ share, logger, ephemeral: true });
    expect(share.provisioned).toBe(true);

    await storage.release();

    expect(share.provisioned).toBe(false);
    expect(share.calls).toContain('share.deleteIfExists:scratch');
  });

  it('should refuse an ephemeral share that already exists', async () => {
    const share = new MemoryShare('scratch');

    await expect(openShareStorage({ share, logger, ephemeral: true })).rejects.toMatchObject({
      code: 'STORAGE_ALREADY_EXISTS',
      message: 'Path already exists: scratch',
    });
  });

  it('should map provisioning outages to BackendUnavailable', async () => {
    const share = new MemoryShare('files', { provisioned: false });
    share.failNext('share.createIfNotExists', new ShareServiceError(503, 'ServerBusy', 'busy'));

    await expect(openShareStorage({ share, logger })).rejects.toMatchObject({
      code: 'STORAGE_BACKEND_UNAVAILABLE',
      message: 'Storage backend unavailable during provision: busy',
    });
  });

  it('should swallow a failed ephemeral cleanup', async () => {
    const share = new MemoryShare('scratch', { provisioned: false });
    const storage = await openShareStorage({ share, logger, ephemeral: true });
    share.failNext('share.deleteIfExists', new ShareServiceError(409, 'ShareHasSnapshots', 'locked'));

    await expect(storage.release()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      { backend: 'azure', err: 'locked' },
      'Storage cleanup failed; continuing'
    );
  });

  it('should pass the overwrite setting to the handle', async () => {
    const share = new MemoryShare('files');
    share.seedFile('a.txt', 'a');
    share.seedFile('b.txt', 'b');

    const storage = await openShareStorage({ share, logger, overwrite: false });

    await expect(storage.copyFile('a.txt', 'b.txt')).rejects.toMatchObject({
      code: 'STORAGE_ALREADY_EXISTS',
    });
  });
});

describe('openFileStorage', () => {
  let logger: FastifyBaseLogger;
  let testDir: string;

  beforeEach(async () => {
    logger = createMockLogger();
    testDir = await mkdtemp(join(tmpdir(), 'sharestore-open-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function fsConfig(overrides: Partial<StorageConfig> = {}): StorageConfig {
    return {
      backend: 'fs',
      overwrite: true,
      ephemeral: false,
      fs: { dataDir: testDir },
      ...overrides,
    };
  }

  it('should store files under the configured data directory', async () => {
    const storage = await openFileStorage(fsConfig(), logger);

    await storage.saveFile('docs/a.txt', 'hello');
    await storage.release();

    expect(storage.backendKind).toBe('fs');
    expect(await readFile(join(testDir, 'docs', 'a.txt'), 'utf8')).toBe('hello');
  });

  it('should use a temporary directory for ephemeral storage', async () => {
    const storage = await openFileStorage(fsConfig({ ephemeral: true }), logger);

    await storage.saveFile('a.txt', 'hello');
    expect((await storage.getFileInfo('a.txt')).length).toBe(5);
    await storage.release();

    expect(existsSync(join(testDir, 'a.txt'))).toBe(false);
    await expect(storage.getFileInfo('a.txt')).rejects.toMatchObject({
      code: 'STORAGE_BACKEND_UNAVAILABLE',
    });
  });

  it('should require an azure section for the azure backend', async () => {
    await expect(openFileStorage(fsConfig({ backend: 'azure' }), logger)).rejects.toThrow(
      'storage.azure is required for the azure backend'
    );
  });
});
