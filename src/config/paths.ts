/**
 * Path utilities for zone-baseline configuration files
 * Provides cross-platform path resolution for files under ~/.zone-baseline
 */

import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Returns the absolute path to the zone-baseline config directory
 * ZBL_HOME points directly at the directory; otherwise ~/.zone-baseline
 *
 * @example
 * // macOS/Linux: /Users/username/.zone-baseline
 * // Windows: C:\Users\username\.zone-baseline
 */
export function getConfigDir(): string {
  const zblHome = process.env.ZBL_HOME?.trim();
  if (zblHome && zblHome.length > 0) return zblHome;
  return path.join(os.homedir(), '.zone-baseline');
}

/**
 * Returns the absolute path to the deployment config file (config.toml)
 * This file holds the API token and the target zone id
 */
export function getDeployConfigPath(): string {
  return path.join(getConfigDir(), 'config.toml');
}

/**
 * Returns the absolute path to the baseline catalog shipped with the package.
 * Resolves the same from src/ (tsx) and dist/ (built).
 */
export function getDefaultCatalogPath(): string {
  return fileURLToPath(new URL('../../catalog/baseline.toml', import.meta.url));
}
