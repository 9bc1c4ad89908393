/**
 * ConfigManager - Settings Resolution
 *
 * Resolves where datasets live and how loud logging is. Each setting comes
 * from the first source that defines it:
 * 1. Explicit overrides (CLI flags)
 * 2. Environment (`DISTRO_INFO_DATA_DIR`, `LOG_LEVEL`)
 * 3. Config file named by `DISTRO_INFO_CONFIG` (YAML or JSON)
 * 4. Hardcoded defaults
 */

import Ajv from 'ajv';
import type { JSONSchemaType } from 'ajv';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { DEFAULT_DATA_DIR } from '../dataset_source';
import { createLogger, isLogLevel } from '../logger';
import type { LogLevel } from '../logger';
import { ConfigError } from './config_manager.errors';
import { CONFIG_ENV, DEFAULT_LOG_LEVEL } from './config_manager.types';
import type { ConfigFile, ConfigOverrides, DistroInfoConfig, IConfigManager } from './config_manager.types';

const logger = createLogger('[ConfigManager] ');

const CONFIG_FILE_SCHEMA: JSONSchemaType<ConfigFile> = {
  type: 'object',
  properties: {
    dataDir: { type: 'string', minLength: 1, nullable: true },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error', 'silent'], nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const validateConfigFile = new Ajv({ allErrors: true }).compile(CONFIG_FILE_SCHEMA);

/**
 * @example
 * ```typescript
 * const config = await new ConfigManager().resolve({ dataDir: '/opt/distro-info' });
 * config.logLevel // from LOG_LEVEL, the config file, or "warn"
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Reads the config file named by `DISTRO_INFO_CONFIG`.
   * Returns null when the variable is unset.
   *
   * @throws ConfigError when the file cannot be read, parsed or validated
   */
  async loadConfigFile(): Promise<ConfigFile | null> {
    const configPath = this.readEnv(CONFIG_ENV.configFile);
    if (configPath === undefined) {
      return null;
    }

    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG',
        configPath
      );
    }

    let data: unknown;
    try {
      data = yaml.load(content);
    } catch (error) {
      throw new ConfigError(
        `Cannot parse config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG',
        configPath
      );
    }

    // An empty file parses to undefined
    if (data === undefined || data === null) {
      return {};
    }

    if (!validateConfigFile(data)) {
      const details = (validateConfigFile.errors ?? [])
        .map(error => `${error.instancePath || 'root'} ${error.message ?? 'is invalid'}`)
        .join('; ');
      throw new ConfigError(`Invalid config file ${configPath}: ${details}`, 'INVALID_CONFIG', configPath);
    }

    logger.debug(`Loaded config file ${configPath}`);
    return data;
  }

  /**
   * @throws ConfigError for an invalid config file or `LOG_LEVEL` value
   */
  async resolve(overrides: ConfigOverrides = {}): Promise<DistroInfoConfig> {
    const file = await this.loadConfigFile();

    return {
      dataDir: overrides.dataDir ?? this.readEnv(CONFIG_ENV.dataDir) ?? file?.dataDir ?? DEFAULT_DATA_DIR,
      logLevel: overrides.logLevel ?? this.readEnvLogLevel() ?? file?.logLevel ?? DEFAULT_LOG_LEVEL,
    };
  }

  private readEnv(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  private readEnvLogLevel(): LogLevel | undefined {
    const value = this.readEnv(CONFIG_ENV.logLevel);
    if (value === undefined) {
      return undefined;
    }
    if (!isLogLevel(value)) {
      throw new ConfigError(
        `Invalid ${CONFIG_ENV.logLevel} "${value}", expected one of debug, info, warn, error, silent`,
        'INVALID_CONFIG',
        CONFIG_ENV.logLevel
      );
    }
    return value;
  }
}

/**
 * Create a ConfigManager reading the current process environment
 */
export function createConfigManager(env?: NodeJS.ProcessEnv): ConfigManager {
  return new ConfigManager(env);
}
