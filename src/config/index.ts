import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config } from './schema.js';

const DEFAULT_CONFIG_PATH =
  process.env.SHARESTORE_CONFIG ?? resolve(process.cwd(), 'config', 'config.json');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Let the Azure connection string come from AZURE_STORAGE_CONNECTION_STRING
 * so the secret can stay out of the config file.
 */
function applyEnvOverrides(raw: unknown): unknown {
  const connectionString = process.env.AZURE_STORAGE_CONNECTION_STRING;
  if (!connectionString || !isRecord(raw)) {
    return raw;
  }
  const storage = isRecord(raw.storage) ? raw.storage : {};
  const azure = isRecord(storage.azure) ? storage.azure : {};
  return { ...raw, storage: { ...storage, azure: { ...azure, connectionString } } };
}

/**
 * Load and validate the service configuration.
 * Fails fast with CONFIG_MISSING, CONFIG_PARSE_ERROR or CONFIG_INVALID.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));

  if (!result.success) {
    // One "path: message" item per issue (zod v4 exposes .issues)
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
