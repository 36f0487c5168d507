/**
 * EFB Home Directory Resolution
 *
 * Default: ~/.ehforwarderbot
 * Data override: EFB_DATA_PATH=/custom/path  => /custom/path/<user>
 * Cache override: EFB_CACHE_PATH=/custom/path => /custom/path/<user>
 *
 * Pure path arithmetic; nothing here touches the filesystem.
 */

import { join } from 'node:path';
import type { PathConfig } from '../config/path-config.js';

export const EFB_DIR_NAME = '.ehforwarderbot';
export const CACHE_DIR_NAME = '.cache';

/**
 * Get the home-relative EFB directory
 *
 * @example
 * getEfbHome({ homeDir: '/home/alice', userName: 'alice' }) // => '/home/alice/.ehforwarderbot'
 */
export function getEfbHome(config: PathConfig): string {
  return join(config.homeDir, EFB_DIR_NAME);
}

/**
 * Get the root all profiles and plugins live under
 *
 * Priority:
 * 1. dataRootOverride, scoped by user name
 * 2. EFB home
 */
export function getDataRoot(config: PathConfig): string {
  if (config.dataRootOverride) {
    return join(config.dataRootOverride, config.userName);
  }

  return getEfbHome(config);
}

/**
 * Get the root of per-profile channel caches
 *
 * Priority:
 * 1. cacheRootOverride, scoped by user name
 * 2. <EFB home>/.cache
 */
export function getCacheRoot(config: PathConfig): string {
  if (config.cacheRootOverride) {
    return join(config.cacheRootOverride, config.userName);
  }

  return join(getEfbHome(config), CACHE_DIR_NAME);
}
