export { ConfigManager, createConfigManager } from './config_manager';
export { ConfigError } from './config_manager.errors';
export type { ConfigErrorCode } from './config_manager.errors';
export { CONFIG_ENV, DEFAULT_LOG_LEVEL } from './config_manager.types';
export type {
  ConfigFile,
  ConfigOverrides,
  DistroInfoConfig,
  IConfigManager,
} from './config_manager.types';
