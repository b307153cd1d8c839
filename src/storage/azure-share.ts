// Azure Files implementation of the share collaborator interface.
//
// Thin mapping onto @azure/storage-file-share. Errors are left as the SDK's
// RestError so ShareBackend can classify them.

import { Readable } from 'node:stream';

import {
  ShareServiceClient,
  StorageSharedKeyCredential,
  type ShareClient,
  type ShareDirectoryClient,
  type ShareFileClient,
} from '@azure/storage-file-share';

import type { AzureStorageConfig } from './config.js';
import { baseName, joinPath, parentPath } from './paths.js';
import type {
  ShareCallOptions,
  ShareCopyStatus,
  ShareDirectoryProperties,
  ShareDirectoryRef,
  ShareFileProperties,
  ShareFileRef,
  ShareListItem,
  ShareRoot,
} from './share-types.js';

class AzureShareFile implements ShareFileRef {
  constructor(
    private readonly client: ShareFileClient,
    readonly path: string
  ) {}

  get url(): string {
    return this.client.url;
  }

  exists(options?: ShareCallOptions): Promise<boolean> {
    return this.client.exists({ abortSignal: options?.abortSignal });
  }

  async getProperties(options?: ShareCallOptions): Promise<ShareFileProperties> {
    const props = await this.client.getProperties({ abortSignal: options?.abortSignal });
    return {
      contentLength: props.contentLength ?? 0,
      ...(props.lastModified && { lastModified: props.lastModified }),
      ...(props.copyStatus && { copyStatus: props.copyStatus }),
    };
  }

  async download(options?: ShareCallOptions): Promise<Readable> {
    const response = await this.client.download(0, undefined, {
      abortSignal: options?.abortSignal,
    });
    const body = response.readableStreamBody;
    if (!body) {
      // Only browsers get a blob body; Node always receives a stream
      throw new Error(`Download of ${this.path} returned no stream body`);
    }
    return body instanceof Readable ? body : Readable.from(body);
  }

  async upload(content: Buffer, options?: ShareCallOptions): Promise<void> {
    await this.client.uploadData(content, { abortSignal: options?.abortSignal });
  }

  async startCopyFrom(source: ShareFileRef, options?: ShareCallOptions): Promise<ShareCopyStatus> {
    const response = await this.client.startCopyFromURL(source.url, {
      abortSignal: options?.abortSignal,
    });
    return response.copyStatus ?? 'pending';
  }

  async deleteIfExists(options?: ShareCallOptions): Promise<boolean> {
    const response = await this.client.deleteIfExists({ abortSignal: options?.abortSignal });
    return response.succeeded;
  }
}

class AzureShareDirectory implements ShareDirectoryRef {
  constructor(
    private readonly client: ShareDirectoryClient,
    readonly path: string
  ) {}

  exists(options?: ShareCallOptions): Promise<boolean> {
    return this.client.exists({ abortSignal: options?.abortSignal });
  }

  async getProperties(options?: ShareCallOptions): Promise<ShareDirectoryProperties> {
    const props = await this.client.getProperties({ abortSignal: options?.abortSignal });
    return props.lastModified ? { lastModified: props.lastModified } : {};
  }

  async createIfNotExists(options?: ShareCallOptions): Promise<boolean> {
    const response = await this.client.createIfNotExists({ abortSignal: options?.abortSignal });
    return response.succeeded;
  }

  async *list(options?: ShareCallOptions): AsyncIterable<ShareListItem> {
    const items = this.client.listFilesAndDirectories({ abortSignal: options?.abortSignal });
    for await (const item of items) {
      if (item.kind === 'directory') {
        yield { kind: 'directory', name: item.name };
      } else {
        yield { kind: 'file', name: item.name, contentLength: item.properties.contentLength };
      }
    }
  }

  file(name: string): AzureShareFile {
    return new AzureShareFile(this.client.getFileClient(name), joinPath(this.path, name));
  }
}

export class AzureShareRoot implements ShareRoot {
  constructor(private readonly client: ShareClient) {}

  get name(): string {
    return this.client.name;
  }

  async create(options?: ShareCallOptions): Promise<void> {
    await this.client.create({ abortSignal: options?.abortSignal });
  }

  async createIfNotExists(options?: ShareCallOptions): Promise<boolean> {
    const response = await this.client.createIfNotExists({ abortSignal: options?.abortSignal });
    return response.succeeded;
  }

  async deleteIfExists(options?: ShareCallOptions): Promise<boolean> {
    const response = await this.client.deleteIfExists({ abortSignal: options?.abortSignal });
    return response.succeeded;
  }

  exists(options?: ShareCallOptions): Promise<boolean> {
    return this.client.exists({ abortSignal: options?.abortSignal });
  }

  getDirectory(path: string): AzureShareDirectory {
    if (path === '') {
      return new AzureShareDirectory(this.client.rootDirectoryClient, '');
    }
    return new AzureShareDirectory(this.client.getDirectoryClient(path), path);
  }

  getFile(path: string): ShareFileRef {
    return this.getDirectory(parentPath(path)).file(baseName(path));
  }
}

/**
 * Build a ShareServiceClient from configuration.
 *
 * Transport retries and per-try timeouts are the SDK's; they surface here as
 * REQUEST_SEND_ERROR / 5xx RestErrors once exhausted.
 *
 * SECURITY: the account key and connection string are never logged.
 */
export function createShareServiceClient(config: AzureStorageConfig): ShareServiceClient {
  const pipelineOptions = {
    retryOptions: {
      maxTries: config.retry.maxTries,
      tryTimeoutInMs: config.retry.tryTimeoutMs,
    },
  };

  if (config.connectionString) {
    return ShareServiceClient.fromConnectionString(config.connectionString, pipelineOptions);
  }

  if (!config.accountName || !config.accountKey) {
    throw new Error('Azure storage requires a connectionString or accountName and accountKey');
  }

  const url = config.url ?? `https://${config.accountName}.file.core.windows.net`;
  const credential = new StorageSharedKeyCredential(config.accountName, config.accountKey);
  return new ShareServiceClient(url, credential, pipelineOptions);
}

export function createAzureShareRoot(service: ShareServiceClient, shareName: string): AzureShareRoot {
  return new AzureShareRoot(service.getShareClient(shareName));
}
