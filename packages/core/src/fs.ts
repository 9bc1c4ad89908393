/**
 * Filesystem-dependent implementations
 *
 * Use @distro-info/core/memory for in-memory alternatives.
 */

// DatasetSource
export { FsDatasetSource } from './dataset_source/fs';
export type { FsDatasetSourceOptions } from './dataset_source/fs';

// ConfigManager (reads the optional config file from disk)
export { ConfigManager, createConfigManager } from './config_manager';
