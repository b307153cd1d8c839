// Shared route schemas and response mapping for the file API.

import { z } from 'zod';

import type { DirectoryContents, FileInfo } from '../storage/types.js';

export interface PathParams {
  '*'?: string;
}

export const pathParamsSchema = z.object({
  '*': z.string().default('').describe('Root-relative storage path'),
});

export const fileInfoSchema = z.object({
  name: z.string(),
  path: z.string(),
  exists: z.boolean(),
  isDirectory: z.boolean(),
  length: z.number().int(),
  lastModified: z.string().optional(),
});

export const directoryContentsSchema = z.object({
  path: z.string(),
  exists: z.boolean(),
  entries: z.array(fileInfoSchema),
});

export const transferBodySchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
});

export type TransferBody = z.infer<typeof transferBodySchema>;

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    kind: z.string().optional(),
    message: z.string(),
    statusCode: z.number(),
    stack: z.string().optional(),
  }),
  requestId: z.string(),
  timestamp: z.string(),
});

export type FileInfoBody = z.infer<typeof fileInfoSchema>;
export type DirectoryContentsBody = z.infer<typeof directoryContentsSchema>;

export function toFileInfoBody(info: FileInfo): FileInfoBody {
  return {
    name: info.name,
    path: info.path,
    exists: info.exists,
    isDirectory: info.isDirectory,
    length: info.length,
    ...(info.lastModified && { lastModified: info.lastModified.toISOString() }),
  };
}

export function toDirectoryContentsBody(contents: DirectoryContents): DirectoryContentsBody {
  return {
    path: contents.path,
    exists: contents.exists,
    entries: contents.entries.map(toFileInfoBody),
  };
}
