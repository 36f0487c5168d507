import { Command } from 'commander';
import { DEFAULT_PROFILE, fixedProfile } from '../../coordinator.js';
import type { PathConfigInput } from '../../config/path-config.js';
import { DEFAULT_CONFIG_EXTENSION, PathResolver } from '../../paths/resolver.js';
import { getErrorCode, getErrorMessage } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';

const log = getLogger('efb.cli');

export type GlobalOptions = {
  profile: string;
  dataRoot?: string;
  cacheRoot?: string;
};

function createResolver(options: GlobalOptions): PathResolver {
  const config: PathConfigInput = {};
  if (options.dataRoot !== undefined) config.dataRoot = options.dataRoot;
  if (options.cacheRoot !== undefined) config.cacheRoot = options.cacheRoot;

  return new PathResolver({ profile: fixedProfile(options.profile), config });
}

/**
 * Print a resolved path, or log the failure and flag a non-zero exit
 */
function printPath(kind: string, command: Command, resolve: (resolver: PathResolver) => string): void {
  try {
    const resolver = createResolver(command.optsWithGlobals<GlobalOptions>());
    console.log(resolve(resolver));
  } catch (error: unknown) {
    const code = getErrorCode(error);
    log.error('Failed to resolve %s path: %s%s', kind, getErrorMessage(error), code ? ` (${code})` : '');
    process.exitCode = 1;
  }
}

export function createPathsProgram(): Command {
  const program = new Command();

  program
    .name('efb-paths')
    .description('Show (and create) the directories of an EFB installation')
    .option('-p, --profile <name>', 'profile to resolve paths for', DEFAULT_PROFILE)
    .option('--data-root <dir>', 'data root, overrides EFB_DATA_PATH')
    .option('--cache-root <dir>', 'cache root, overrides EFB_CACHE_PATH');

  program
    .command('base')
    .description('Base data directory')
    .action((_options: object, command: Command) => {
      printPath('base', command, (resolver) => resolver.getBasePath());
    });

  program
    .command('data')
    .description('Data directory of a channel')
    .argument('<channel>', 'channel id')
    .action((channel: string, _options: object, command: Command) => {
      printPath('data', command, (resolver) => resolver.getDataPath(channel));
    });

  program
    .command('config')
    .description('Configuration file of a channel, or of the profile when no channel is given')
    .argument('[channel]', 'channel id')
    .option('-e, --ext <ext>', 'file extension', DEFAULT_CONFIG_EXTENSION)
    .action((channel: string | undefined, options: { ext: string }, command: Command) => {
      printPath('config', command, (resolver) => resolver.getConfigPath(channel, options.ext));
    });

  program
    .command('cache')
    .description('Cache directory of a channel')
    .argument('<channel>', 'channel id')
    .action((channel: string, _options: object, command: Command) => {
      printPath('cache', command, (resolver) => resolver.getCachePath(channel));
    });

  program
    .command('plugins')
    .description('Directory custom channels are loaded from')
    .action((_options: object, command: Command) => {
      printPath('plugins', command, (resolver) => resolver.getPluginsPath());
    });

  return program;
}
