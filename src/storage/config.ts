import { z } from 'zod';

/** Azure share names: 3-63 chars, lowercase letters, digits and single hyphens. */
const SHARE_NAME_PATTERN = /^[a-z0-9](?:[a-z0-9]|-(?=[a-z0-9])){2,62}$/;

/**
 * Azure Files configuration.
 *
 * SECURITY: `connectionString` and `accountKey` are sensitive. They must never
 * appear in logs.
 */
export const AzureStorageConfigSchema = z.object({
  /** Full connection string (takes precedence over account name/key) */
  connectionString: z.string().min(1).optional(),
  accountName: z.string().min(1).optional(),
  /** Shared key (sensitive - never log) */
  accountKey: z.string().min(1).optional(),
  /** Service URL override (derived from accountName if not set) */
  url: z.string().url().optional(),
  /** Share to use; ignored when storage.ephemeral is set */
  shareName: z
    .string()
    .regex(SHARE_NAME_PATTERN, 'Share names are 3-63 lowercase letters, digits or hyphens')
    .optional(),

  /** SDK transport retry policy */
  retry: z
    .object({
      maxTries: z.number().int().min(1).max(10).default(4),
      tryTimeoutMs: z.number().int().min(1000).max(600000).default(30000),
    })
    .default(() => ({ maxTries: 4, tryTimeoutMs: 30000 })),

  /** Interval between copy-status polls while a server-side copy is pending */
  copyPollIntervalMs: z.number().int().min(10).max(60000).default(500),
  /** Give up waiting on a pending copy after this long */
  copyTimeoutMs: z.number().int().min(100).max(3600000).default(60000),
});

export type AzureStorageConfig = z.infer<typeof AzureStorageConfigSchema>;

export const StorageConfigSchema = z
  .object({
    /** Storage backend type */
    backend: z.enum(['azure', 'fs']).default('fs'),
    /** Replace existing targets on copy/rename (false: fail with STORAGE_ALREADY_EXISTS) */
    overwrite: z.boolean().default(true),
    /** Provision an isolated root for this process and remove it on release */
    ephemeral: z.boolean().default(false),
    /** Filesystem backend options */
    fs: z
      .object({
        /** Directory for stored files (default: ./data/files) */
        dataDir: z.string().min(1).default('./data/files'),
      })
      .default(() => ({ dataDir: './data/files' })),
    /** Azure Files backend options */
    azure: AzureStorageConfigSchema.optional(),
  })
  .superRefine((data, ctx) => {
    if (data.backend !== 'azure') return;

    if (!data.azure) {
      ctx.addIssue({
        code: 'custom',
        message: 'Azure backend requires an azure section',
        path: ['azure'],
      });
      return;
    }

    const { connectionString, accountName, accountKey, shareName } = data.azure;
    if (!connectionString && !(accountName && accountKey)) {
      ctx.addIssue({
        code: 'custom',
        message: 'Provide azure.connectionString or azure.accountName with azure.accountKey',
        path: ['azure'],
      });
    }

    if (!shareName && !data.ephemeral) {
      ctx.addIssue({
        code: 'custom',
        message: 'azure.shareName is required unless storage.ephemeral is true',
        path: ['azure', 'shareName'],
      });
    }
  });

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
