import type { DistroName } from '../distro_release';

/**
 * Where distro-info-data installs its datasets on Debian and Ubuntu.
 */
export const DEFAULT_DATA_DIR = '/usr/share/distro-info';

/**
 * Options for FsDatasetSource.
 */
export type FsDatasetSourceOptions = {
  /** Directory holding `<distro>.csv` files. Default: /usr/share/distro-info */
  dataDir?: string;
}

/**
 * Options for MemoryDatasetSource.
 */
export type MemoryDatasetSourceOptions = {
  /** Dataset text per distribution */
  datasets?: Partial<Record<DistroName, string>>;
}
