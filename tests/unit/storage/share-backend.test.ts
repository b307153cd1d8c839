import { PassThrough, Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';

import type { FastifyBaseLogger } from 'fastify';
import { describe, it, expect, beforeEach } from 'vitest';

import { ShareBackend } from '@/storage/share-backend.js';

import { createMockLogger } from '../../helpers/logger.js';
import { MemoryShare, ShareServiceError } from '../../helpers/memory-share.js';

const MODIFIED = new Date('2024-01-02T03:04:05.000Z');

function content(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

describe('ShareBackend', () => {
  let share: MemoryShare;
  let logger: FastifyBaseLogger;
  let backend: ShareBackend;

  beforeEach(() => {
    share = new MemoryShare();
    logger = createMockLogger();
    backend = new ShareBackend({ share, logger, copyPollIntervalMs: 1, copyTimeoutMs: 1000 });
  });

  it('should report the azure kind', () => {
    expect(backend.kind).toBe('azure');
  });

  describe('save()', () => {
    it('should create missing parent directories before uploading', async () => {
      await backend.save('a/b/c.txt', content('hello'));

      expect(share.readFile('a/b/c.txt')).toBe('hello');
      expect(share.calls).toEqual([
        'dir.create:a',
        'dir.create:a/b',
        'file.upload:a/b/c.txt',
      ]);
    });

    it('should not create directories for root-level files', async () => {
      await backend.save('a.txt', content('hello'));

      expect(share.calls).toEqual(['file.upload:a.txt']);
    });

    it('should replace an existing file', async () => {
      share.seedFile('a.txt', 'old');

      await backend.save('a.txt', content('new'));

      expect(share.readFile('a.txt')).toBe('new');
    });

    it('should map upload throttling to BackendUnavailable', async () => {
      share.failNext('file.upload', new ShareServiceError(503, 'ServerBusy'));

      await expect(backend.save('a.txt', content('x'))).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
      });
    });
  });

  describe('getStream()', () => {
    it('should stream the file content', async () => {
      share.seedFile('docs/a.txt', 'hello');

      const stream = await backend.getStream('docs/a.txt');

      expect((await buffer(stream)).toString('utf8')).toBe('hello');
    });

    it('should fail with NotFound for a missing file', async () => {
      await expect(backend.getStream('missing.txt')).rejects.toMatchObject({
        code: 'STORAGE_NOT_FOUND',
        message: 'Path not found: missing.txt',
      });
    });
 
    it('should translate failures raised while the body is read', async () => {
      share.seedFile('a.txt', 'hello');
      share.downloadStreamFailure = new ShareServiceError(500, 'InternalError', 'connection reset');

      const stream = await backend.getStream('a.txt');

      await expect(buffer(stream)).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
      });
    });

    it('should stream an empty file as zero bytes', async () => {
      await backend.save('empty.txt', Readable.from([Buffer.alloc(0)]));

      const stream = await backend.getStream('empty.txt');

      expect((await buffer(stream)).length).toBe(0);
    });
  });

  describe('stat()', () => {
    it('should describe a file', async () => {
      share.seedFile('docs/a.txt', 'hello');

      expect(await backend.stat('docs/a.txt')).toEqual({
        name: 'a.txt',
        path: 'docs/a.txt',
        exists: true,
        isDirectory: false,
        length: 5,
        lastModified: MODIFIED,
      });
    });

    it('should describe a directory', async () => {
      share.seedFile('docs/a.txt', 'hello');

      const info = await backend.stat('docs');

      expect(info.exists).toBe(true);
      expect(info.isDirectory).toBe(true);
      expect(info.length).toBe(0);
    });

    it('should report a missing path without failing', async () => {
      expect(await backend.stat('nope/x.txt')).toEqual({
        name: 'x.txt',
        path: 'nope/x.txt',
        exists: false,
        isDirectory: false,
        length: 0,
      });
    });

    it('should describe the root through the share itself', async () => {
      const info = await backend.stat('');

      expect(info).toMatchObject({ path: '', exists: true, isDirectory: true });
      expect(share.calls).toEqual(['share.exists:test-share']);
    });

    it('should report an unprovisioned share root as missing', async () => {
      const missing = new ShareBackend({ share: new MemoryShare('gone', { provisioned: false }), logger });

      expect((await missing.stat('')).exists).toBe(false);
    });

    it('should surface failures other than absence', async () => {
      share.failNext('file.getProperties', new ShareServiceError(403, 'AuthorizationFailure'));

      await expect(backend.stat('a.txt')).rejects.toMatchObject({ code: 'STORAGE_UNKNOWN' });
    });
  });

  describe('list()', () => {
    it('should list files and directories in enumeration order', async () => {
      share.seedFile('a.txt', 'hello');
      share.seedFile('docs/b.txt', 'bb');

      const contents = await backend.list('');

      expect(contents.path).toBe('');
      expect(contents.exists).toBe(true);
      expect(contents.entries).toEqual([
        { name: 'a.txt', path: 'a.txt', exists: true, isDirectory: false, length: 5 },
        { name: 'docs', path: 'docs', exists: true, isDirectory: true, length: 0 },
      ]);
    });

    it('should prefix entry paths with the listed directory', async () => {
      share.seedFile('docs/b.txt', 'bb');

      const contents = await backend.list('docs');

      expect(contents.entries.map((e) => e.path)).toEqual(['docs/b.txt']);
    });

    it('should report a missing directory when enumeration fails with 404', async () => {
      expect(await backend.list('nope')).toEqual({ path: 'nope', exists: false, entries: [] });
    });

    it('should report a missing directory when enumeration returns nothing', async () => {
      share.listMissingAsEmpty = true;

      expect(await backend.list('nope')).toEqual({ path: 'nope', exists: false, entries: [] });
    });

    it('should report an empty existing directory', async () => {
      share.seedFile('docs/b.txt', 'bb');
      await backend.delete('docs/b.txt');

      expect(await backend.list('docs')).toEqual({ path: 'docs', exists: true, entries: [] });
    });

    it('should surface enumeration failures other than absence', async () => {
      share.failNext('dir.list', new ShareServiceError(503, 'ServerBusy'));

      await expect(backend.list('')).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
      });
    });
  });

  describe('delete()', () => {
    it('should delete an existing file', async () => {
      share.seedFile('a.txt', 'hello');

      await backend.delete('a.txt');

      expect(share.readFile('a.txt')).toBeUndefined();
    });

    it('should succeed for a missing file', async () => {
      await expect(backend.delete('missing.txt')).resolves.toBeUndefined();
    });

    it('should succeed when the parent directory is missing', async () => {
      await expect(backend.delete('no/such/dir/a.txt')).resolves.toBeUndefined();
    });
  });

  describe('copy()', () => {
    it('should copy into a new directory and keep the source', async () => {
      share.seedFile('a.txt', 'hello');

      await backend.copy('a.txt', 'backup/a.txt');

      expect(share.readFile('backup/a.txt')).toBe('hello');
      expect(share.readFile('a.txt')).toBe('hello');
    });

    it('should fail with NotFound for a missing source and create nothing', async () => {
      await expect(backend.copy('missing.txt', 'out/b.txt')).rejects.toMatchObject({
        code: 'STORAGE_NOT_FOUND',
        message: 'Path not found: missing.txt',
      });
      expect(share.hasDirectory('out')).toBe(false);
    });

    it('should leave a file copied onto itself untouched', async () => {
      share.seedFile('a.txt', 'hello');

      await backend.copy('a.txt', 'a.txt');

      expect(share.readFile('a.txt')).toBe('hello');
      expect(share.calls).toEqual(['file.exists:a.txt']);
    });

    it('should poll until a pending copy completes', async () => {
      share.seedFile('a.txt', 'hello');
      share.copyPendingPolls = 2;

      await backend.copy('a.txt', 'b.txt');

      const polls = share.calls.filter((call) => call === 'file.getProperties:b.txt');
      expect(polls).toHaveLength(2);
      expect(share.readFile('b.txt')).toBe('hello');
    });

    it('should fail with Unknown when the copy does not succeed', async () => {
      share.seedFile('a.txt', 'hello');
      share.copyOutcome = 'failed';

      await expect(backend.copy('a.txt', 'b.txt')).rejects.toMatchObject({
        code: 'STORAGE_UNKNOWN',
        message: 'Storage operation copy failed: copy to b.txt ended with status failed',
      });
    });

    it('should give up on a copy that stays pending', async () => {
      const slow = new ShareBackend({ share, logger, copyPollIntervalMs: 1, copyTimeoutMs: 5 });
      share.seedFile('a.txt', 'hello');
      share.copyPendingPolls = 1_000_000;

      await expect(slow.copy('a.txt', 'b.txt')).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
        message: 'Storage backend unavailable during copy: copy to b.txt did not complete',
      });
    });
  });

  describe('rename()', () => {
    it('should move the file', async () => {
      share.seedFile('a.txt', 'hello');

      await backend.rename('a.txt', 'moved/a.txt');

      expect(share.readFile('moved/a.txt')).toBe('hello');
      expect(share.readFile('a.txt')).toBeUndefined();
    });

    it('should leave an existing file alone when source equals target', async () => {
      share.seedFile('a.txt', 'hello');

      await backend.rename('a.txt', 'a.txt');

      expect(share.readFile('a.txt')).toBe('hello');
      expect(share.calls).toEqual(['file.exists:a.txt']);
    });

    it('should fail with NotFound when source equals target and is missing', async () => {
      await expect(backend.rename('a.txt', 'a.txt')).rejects.toMatchObject({
        code: 'STORAGE_NOT_FOUND',
      });
    });

    it('should fail with NotFound for a missing source', async () => {
      await expect(backend.rename('missing.txt', 'b.txt')).rejects.toMatchObject({
        code: 'STORAGE_NOT_FOUND',
        message: 'Path not found: missing.txt',
      });
    });

    it('should leave both files and warn when deleting the source fails', async () => {
      share.seedFile('a.txt', 'hello');
      share.failNext('file.delete', new ShareServiceError(500, 'InternalError'));

      await expect(backend.rename('a.txt', 'b.txt')).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
      });
      expect(share.readFile('a.txt')).toBe('hello');
      expect(share.readFile('b.txt')).toBe('hello');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ source: 'a.txt', target: 'b.txt' }),
        'Rename copied the file but could not delete the source'
      );
    });
  });

  describe('cancellation', () => {
    it('should not touch the share when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        backend.save('a.txt', content('x'), { signal: controller.signal })
      ).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
        message: 'Storage backend unavailable during save: operation was cancelled',
      });
      expect(share.calls).toEqual([]);
    });

    it('should stop buffering a save when aborted', async () => {
      const body = new PassThrough();
      body.write('partial');
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        backend.save('a.txt', body, { signal: controller.signal })
      ).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
        message: 'Storage backend unavailable during save: operation was cancelled',
      });
      expect(share.calls).toEqual([]);
    });

    it('should stop waiting on a pending copy when aborted', async () => {
      share.seedFile('a.txt', 'hello');
      share.copyPendingPolls = 1_000_000;
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        backend.copy('a.txt', 'b.txt', { signal: controller.signal })
      ).rejects.toMatchObject({
        code: 'STORAGE_BACKEND_UNAVAILABLE',
        message: 'Storage backend unavailable during copy: operation was cancelled',
      });
    });
  });

  describe('healthy()', () => {
    it('should be true while the share exists', async () => {
      expect(await backend.healthy()).toBe(true);
    });

    it('should be false when the share is gone', async () => {
      await share.deleteIfExists();

      expect(await backend.healthy()).toBe(false);
    });

    it('should be false when the probe fails', async () => {
      share.failNext('share.exists', new ShareServiceError(503, 'ServerBusy'));

      expect(await backend.healthy()).toBe(false);
    });
  });
});
