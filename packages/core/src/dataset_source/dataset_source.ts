/**
 * DatasetSource Interface
 *
 * Supplies the raw lines of a distribution's dataset. The loader and the
 * status engine never know whether the lines came from a packaged file or
 * from memory.
 *
 * @module dataset_source
 */

import type { DistroName } from '../distro_release';

/**
 * Source of dataset lines, one dataset per distribution.
 *
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * import { FsDatasetSource } from '@distro-info/core/fs';
 * const source = new FsDatasetSource({ dataDir: '/usr/share/distro-info' });
 *
 * // Memory backend (testing, embedding)
 * import { MemoryDatasetSource } from '@distro-info/core/memory';
 * const source = new MemoryDatasetSource({ datasets: { ubuntu: 'version,codename,...' } });
 *
 * const lines = await source.readLines('ubuntu');
 * ```
 */
export interface DatasetSource {
  /**
   * Reads every line of the dataset, in order.
   * @throws DatasetSourceError if the dataset is missing or unreadable
   */
  readLines(distro: DistroName): Promise<string[]>;

  /**
   * Checks whether a dataset exists for the distribution.
   */
  exists(distro: DistroName): Promise<boolean>;

  /**
   * Human-readable location of the dataset, used in messages.
   */
  describe(distro: DistroName): string;
}
