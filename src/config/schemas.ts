/**
 * Zod schemas for configuration validation
 */

import { z } from 'zod';

export const DEFAULT_API_BASE_URL = 'https://api.cloudflare.com/client/v4';

/**
 * Values that ship in example config files and must never reach the API
 */
export const PLACEHOLDER_SENTINELS: readonly string[] = [
  'your_api_token_here',
  'your_zone_id_here',
  'YOUR_API_TOKEN',
  'YOUR_ZONE_ID',
  'changeme',
  '<token>',
  '<zone-id>',
];

export const apiOptionsSchema = z
  .object({
    base_url: z.string().url().default(DEFAULT_API_BASE_URL),
    timeout_ms: z.number().int().positive().default(15_000),
  })
  .default({});

export const retryOptionsSchema = z
  .object({
    attempts: z.number().int().min(1).max(10).default(3),
    base_delay_ms: z.number().int().min(0).default(500),
  })
  .default({});

/**
 * Schema for the config file (~/.zone-baseline/config.toml)
 * Credentials are optional here because the environment may supply them
 */
export const deployConfigFileSchema = z
  .object({
    api_token: z.string().optional(),
    zone_id: z.string().optional(),
    api: apiOptionsSchema,
    retry: retryOptionsSchema,
  })
  .passthrough();

export type DeployConfigFile = z.infer<typeof deployConfigFileSchema>;

/**
 * Fully resolved configuration handed to the deployment runner
 */
export interface DeployConfig {
  apiToken: string;
  zoneId: string;
  apiBaseUrl: string;
  timeoutMs: number;
  retry: {
    attempts: number;
    baseDelayMs: number;
  };
}
