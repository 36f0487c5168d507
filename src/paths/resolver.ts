/**
 * Path Resolver
 *
 * Composes the data root, the active profile and a channel id into
 * directories, creating each one before returning it:
 *
 *   <base>/
 *     plugins/
 *     <profile>/
 *       config.<ext>
 *       <channel-id>/
 *         config.<ext>
 *   <cache-base>/<profile>/<channel-id>/
 *
 * Channel ids and extensions are used verbatim. A value containing a path
 * separator or `..` resolves outside this tree.
 */

import { mkdirSync } from 'node:fs';
import { join, sep } from 'node:path';
import { coordinator, type ProfileProvider } from '../coordinator.js';
import { resolvePathConfig, type PathConfig, type PathConfigInput } from '../config/path-config.js';
import { getCacheRoot, getDataRoot } from '../utils/efb-home.js';

export const PLUGINS_DIR_NAME = 'plugins';
export const DEFAULT_CONFIG_EXTENSION = 'yaml';

export interface PathResolverOptions {
  /** Source of the active profile. Default: the process coordinator */
  profile?: ProfileProvider;
  /** Explicit values that beat the environment */
  config?: PathConfigInput;
  /** Environment to read overrides from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

function withTrailingSeparator(path: string): string {
  return path.endsWith(sep) ? path : path + sep;
}

/**
 * Create a directory and its parents if missing.
 * Filesystem errors reach the caller unchanged.
 */
function ensureDirectory(path: string): string {
  mkdirSync(path, { recursive: true });
  return withTrailingSeparator(path);
}

export class PathResolver {
  private readonly profileProvider: ProfileProvider;
  private readonly configInput: PathConfigInput;
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(options: PathResolverOptions = {}) {
    this.profileProvider = options.profile ?? coordinator;
    this.configInput = options.config ?? {};
    this.env = options.env;
  }

  /**
   * Configuration is resolved on every call so that environment changes
   * take effect immediately.
   */
  private loadConfig(): PathConfig {
    return resolvePathConfig(this.configInput, this.env ?? process.env);
  }

  /**
   * Get the base data path.
   *
   * `$EFB_DATA_PATH/<user>/` when the override is set, `~/.ehforwarderbot/`
   * otherwise.
   */
  getBasePath(): string {
    return ensureDirectory(getDataRoot(this.loadConfig()));
  }

  /**
   * Get the data directory of a channel: `<base>/<profile>/<channelId>/`.
   */
  getDataPath(channelId: string): string {
    const profile = this.profileProvider.profile;
    return ensureDirectory(join(this.getBasePath(), profile, channelId));
  }

  /**
   * Get the path of a configuration file.
   *
   * With a channel id the file sits in the channel's data directory,
   * otherwise in the profile directory. Only the directory is created.
   *
   * @example
   * resolver.getConfigPath()              // => '<base>/default/config.yaml'
   * resolver.getConfigPath('irc', 'json') // => '<base>/default/irc/config.json'
   */
  getConfigPath(channelId?: string, ext: string = DEFAULT_CONFIG_EXTENSION): string {
    const directory = channelId
      ? this.getDataPath(channelId)
      : ensureDirectory(join(this.getBasePath(), this.profileProvider.profile));
    return join(directory, `config.${ext}`);
  }

  /**
   * Get the cache directory of a channel: `<cache root>/<profile>/<channelId>/`.
   *
   * `$EFB_CACHE_PATH/<user>` when the override is set,
   * `~/.ehforwarderbot/.cache` otherwise.
   */
  getCachePath(channelId: string): string {
    const profile = this.profileProvider.profile;
    const cacheRoot = getCacheRoot(this.loadConfig());
    return ensureDirectory(join(cacheRoot, profile, channelId));
  }

  /**
   * Get the directory custom channels and middlewares are loaded from.
   */
  getPluginsPath(): string {
    return ensureDirectory(join(this.getBasePath(), PLUGINS_DIR_NAME));
  }
}

const defaultResolver = new PathResolver();

export function getBasePath(): string {
  return defaultResolver.getBasePath();
}

export function getDataPath(channelId: string): string {
  return defaultResolver.getDataPath(channelId);
}

export function getConfigPath(channelId?: string, ext?: string): string {
  return defaultResolver.getConfigPath(channelId, ext);
}

export function getCachePath(channelId: string): string {
  return defaultResolver.getCachePath(channelId);
}

export function getPluginsPath(): string {
  return defaultResolver.getPluginsPath();
}
