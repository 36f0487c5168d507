/**
 * Path Configuration
 *
 * Collects everything the path resolver reads from its surroundings into one
 * object: root overrides, home directory and OS user name.
 *
 * Priority for each root:
 * 1. Explicit input (CLI flags, embedding code, tests)
 * 2. Environment variable (EFB_DATA_PATH / EFB_CACHE_PATH)
 * 3. Home-relative default (see efb-home.ts)
 */

import { homedir, userInfo } from 'node:os';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const DATA_PATH_ENV = 'EFB_DATA_PATH';
export const CACHE_PATH_ENV = 'EFB_CACHE_PATH';

/** Environment variables consulted for the OS user name, in order */
const USER_NAME_ENV = ['LOGNAME', 'USER', 'LNAME', 'USERNAME'] as const;

const pathConfigInputSchema = z
  .object({
    dataRoot: z.string().min(1).optional(),
    cacheRoot: z.string().min(1).optional(),
    homeDir: z.string().min(1).optional(),
    userName: z.string().min(1).optional()
  })
  .strict();

export type PathConfigInput = z.input<typeof pathConfigInputSchema>;

export interface PathConfig {
  /** Replaces the home-relative data root; scoped by user name */
  dataRootOverride?: string;
  /** Replaces the home-relative cache root; scoped by user name */
  cacheRootOverride?: string;
  homeDir: string;
  userName: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Get the name of the user running the process.
 * Login environment variables win over the account database.
 */
export function getOsUserName(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of USER_NAME_ENV) {
    const value = env[name];
    if (value) {
      return value;
    }
  }
  return userInfo().username;
}

/**
 * Build a PathConfig from explicit input and the environment.
 *
 * @param input - Explicit values; each one beats the environment
 * @param env - Environment to read overrides from
 * @throws ConfigurationError when input contains empty values or unknown keys
 *
 * @example
 * resolvePathConfig({}, { EFB_DATA_PATH: '/srv/efb' })
 * // => { dataRootOverride: '/srv/efb', homeDir: '/home/alice', userName: 'alice' }
 */
export function resolvePathConfig(
  input: PathConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PathConfig {
  const parsed = pathConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid path configuration: ${details}`);
  }

  const options = parsed.data;
  return {
    dataRootOverride: options.dataRoot ?? nonEmpty(env[DATA_PATH_ENV]),
    cacheRootOverride: options.cacheRoot ?? nonEmpty(env[CACHE_PATH_ENV]),
    homeDir: options.homeDir ?? homedir(),
    userName: options.userName ?? getOsUserName(env)
  };
}
