/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Fully resolved settings.
 */
export type DistroInfoConfig = {
  /** Directory holding `ubuntu.csv` and `debian.csv` */
  dataDir: string;
  logLevel: LogLevel;
};

/**
 * Contents of the optional config file. Every key may be left out.
 */
export type ConfigFile = {
  dataDir?: string;
  logLevel?: LogLevel;
};

/**
 * Values given explicitly by the caller (usually CLI flags).
 */
export type ConfigOverrides = Partial<DistroInfoConfig>;

/**
 * Environment variables the manager reads.
 */
export const CONFIG_ENV = {
  dataDir: 'DISTRO_INFO_DATA_DIR',
  logLevel: 'LOG_LEVEL',
  configFile: 'DISTRO_INFO_CONFIG',
} as const;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface IConfigManager {
  loadConfigFile(): Promise<ConfigFile | null>;
  resolve(overrides?: ConfigOverrides): Promise<DistroInfoConfig>;
}
