// Library entry point

export { ConfigLoader, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './shared/config/ConfigLoader.js';
export type { ConfigLoadOptions, ConfigLoaderOptions } from './shared/config/ConfigLoader.js';
export {
  ConfigSchema,
  ConfigOverridesSchema,
  WhoisApiConfigSchema,
  LoggingConfigSchema,
} from './shared/config/schemas.js';
export type {
  Config,
  ConfigOverrides,
  WhoisApiConfig,
  LoggingConfig,
  LogLevel,
} from './shared/config/schemas.js';
export { Logger, logger } from './shared/utils/logger.js';
export { FileSystemAdapter } from './platform/index.js';
export type { IFileSystem } from './platform/index.js';
export * from './features/whois/index.js';
