export { ChatType } from './constants.js';
export { Coordinator, coordinator, fixedProfile, DEFAULT_PROFILE, type ProfileProvider } from './coordinator.js';
export {
  resolvePathConfig,
  getOsUserName,
  DATA_PATH_ENV,
  CACHE_PATH_ENV,
  type PathConfig,
  type PathConfigInput
} from './config/path-config.js';
export {
  PathResolver,
  getBasePath,
  getDataPath,
  getConfigPath,
  getCachePath,
  getPluginsPath,
  PLUGINS_DIR_NAME,
  DEFAULT_CONFIG_EXTENSION,
  type PathResolverOptions
} from './paths/resolver.js';
export {
  extra,
  getExtraFunctions,
  getExtraFunctionDescriptor,
  isExtraFunction,
  formatExtraDescription,
  invokeExtraFunction,
  FUNCTION_NAME_PLACEHOLDER,
  type ExtraFunction,
  type ExtraFunctionDescriptor,
  type ExtraFunctionHandler
} from './extra/extra.js';
export { Emoji, getSourceEmoji } from './utils/emoji.js';
export { Logging, Logger, LogLevel, getLogger, getLogFilePath, resetLogging } from './utils/logger.js';
export { getEfbHome, getDataRoot, getCacheRoot, EFB_DIR_NAME, CACHE_DIR_NAME } from './utils/efb-home.js';
export {
  EfbError,
  ConfigurationError,
  ExtraFunctionNotFoundError,
  ExtraFunctionError,
  getErrorMessage,
  getErrorCode
} from './utils/errors.js';
