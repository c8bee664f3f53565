/**
 * Deployment configuration loader (TOML format)
 * Resolves the API token and zone id from config.toml and the environment
 */

import fs from 'node:fs';
import { parse } from '@iarna/toml';
import { ConfigInvalidError } from '../errors.js';
import { getDeployConfigPath } from './paths.js';
import {
  type DeployConfig,
  type DeployConfigFile,
  deployConfigFileSchema,
  PLACEHOLDER_SENTINELS,
} from './schemas.js';

export interface LoadDeployConfigOptions {
  /** Explicit config file; defaults to $ZBL_HOME/config.toml */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string, explicit: boolean): DeployConfigFile {
  if (!fs.existsSync(configPath)) {
    if (explicit) {
      throw new ConfigInvalidError(`Config file not found: ${configPath}`);
    }
    return deployConfigFileSchema.parse({});
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed = content.trim().length === 0 ? {} : parse(content);
    return deployConfigFileSchema.parse(parsed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalidError(`Failed to load config from ${configPath}: ${reason}`, {
      cause: error,
    });
  }
}

function pickValue(envValue: string | undefined, fileValue: string | undefined): string {
  const fromEnv = envValue?.trim();
  if (fromEnv && fromEnv.length > 0) return fromEnv;
  return fileValue?.trim() ?? '';
}

export function isPlaceholderValue(value: string): boolean {
  return PLACEHOLDER_SENTINELS.includes(value.trim());
}

function requireCredential(
  field: string,
  envName: string,
  value: string,
  configPath: string
): string {
  if (value.length === 0) {
    throw new ConfigInvalidError(
      `Missing ${field}. Set ${envName} or add ${field} to ${configPath}`
    );
  }
  if (isPlaceholderValue(value)) {
    throw new ConfigInvalidError(
      `${field} is still the placeholder value ${JSON.stringify(value)}. Replace it with a real value.`
    );
  }
  return value;
}

/**
 * Loads and validates the deployment configuration
 * Environment variables (CLOUDFLARE_API_TOKEN, ZONE_ID) override the file
 *
 * @throws {ConfigInvalidError} If a credential is missing or a placeholder, or the file is invalid
 */
export function loadDeployConfig(options: LoadDeployConfigOptions = {}): DeployConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getDeployConfigPath();
  const file = readConfigFile(configPath, options.configPath !== undefined);

  const apiToken = requireCredential(
    'api_token',
    'CLOUDFLARE_API_TOKEN',
    pickValue(env.CLOUDFLARE_API_TOKEN, file.api_token),
    configPath
  );
  const zoneId = requireCredential(
    'zone_id',
    'ZONE_ID',
    pickValue(env.ZONE_ID, file.zone_id),
    configPath
  );

  return {
    apiToken,
    zoneId,
    apiBaseUrl: file.api.base_url.replace(/\/+$/, ''),
    timeoutMs: file.api.timeout_ms,
    retry: {
      attempts: file.retry.attempts,
      baseDelayMs: file.retry.base_delay_ms,
    },
  };
}
