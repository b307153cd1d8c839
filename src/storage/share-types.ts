// Remote file-share collaborator interface.
//
// The primitives the share backend needs from a cloud file service: share
// provisioning, directory and file references, streams, server-side copy,
// enumeration and existence probes. Implementations throw their native errors
// (HTTP 404 = absent); ShareBackend does the translating.

import type { Readable } from 'node:stream';

export type ShareCopyStatus = 'pending' | 'success' | 'aborted' | 'failed';

export interface ShareCallOptions {
  abortSignal?: AbortSignal;
}

export interface ShareFileProperties {
  contentLength: number;
  lastModified?: Date;
  /** Status of the last copy into this file, when there was one */
  copyStatus?: ShareCopyStatus;
}

export interface ShareDirectoryProperties {
  lastModified?: Date;
}

export interface ShareListItem {
  kind: 'file' | 'directory';
  name: string;
  contentLength?: number;
}

export interface ShareFileRef {
  /** Share-relative path */
  readonly path: string;
  /** Resource URL, used as the source of a server-side copy */
  readonly url: string;
  exists(options?: ShareCallOptions): Promise<boolean>;
  getProperties(options?: ShareCallOptions): Promise<ShareFileProperties>;
  download(options?: ShareCallOptions): Promise<Readable>;
  /** Create or replace the file with the given content */
  upload(content: Buffer, options?: ShareCallOptions): Promise<void>;
  /** Start a server-side copy from `source` into this file */
  startCopyFrom(source: ShareFileRef, options?: ShareCallOptions): Promise<ShareCopyStatus>;
  /** Returns true when a file was deleted */
  deleteIfExists(options?: ShareCallOptions): Promise<boolean>;
}

export interface ShareDirectoryRef {
  readonly path: string;
  exists(options?: ShareCallOptions): Promise<boolean>;
  getProperties(options?: ShareCallOptions): Promise<ShareDirectoryProperties>;
  /** Returns true when the directory was created by this call */
  createIfNotExists(options?: ShareCallOptions): Promise<boolean>;
  list(options?: ShareCallOptions): AsyncIterable<ShareListItem>;
}

export interface ShareRoot {
  readonly name: string;
  /** Create the share; fails when it already exists */
  create(options?: ShareCallOptions): Promise<void>;
  /** Returns true when the share was created by this call */
  createIfNotExists(options?: ShareCallOptions): Promise<boolean>;
  /** Returns true when a share was deleted */
  deleteIfExists(options?: ShareCallOptions): Promise<boolean>;
  exists(options?: ShareCallOptions): Promise<boolean>;
  /** Directory reference; '' is the share root */
  getDirectory(path: string): ShareDirectoryRef;
  getFile(path: string): ShareFileRef;
}
