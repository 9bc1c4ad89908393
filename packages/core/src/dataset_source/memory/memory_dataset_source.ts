/**
 * MemoryDatasetSource - In-memory DatasetSource
 *
 * Serves dataset text held in memory. Used in tests and by callers that
 * bundle their own data.
 *
 * @module dataset_source/memory/memory_dataset_source
 */

import type { DistroName } from '../../distro_release';
import { splitLines } from '../../dataset_loader';
import type { DatasetSource } from '../dataset_source';
import { DatasetSourceError } from '../dataset_source.errors';
import type { MemoryDatasetSourceOptions } from '../dataset_source.types';

/**
 * @example
 * ```typescript
 * const source = new MemoryDatasetSource({
 *   datasets: {
 *     ubuntu: 'version,codename,series,created,release,eol\n4.10,Warty Warthog,warty,2004-03-05,2004-10-20,2006-04-30',
 *   },
 * });
 * ```
 */
export class MemoryDatasetSource implements DatasetSource {
  private readonly datasets: Map<DistroName, string>;

  constructor(options: MemoryDatasetSourceOptions = {}) {
    this.datasets = new Map();
    const { ubuntu, debian } = options.datasets ?? {};
    if (ubuntu !== undefined) this.datasets.set('ubuntu', ubuntu);
    if (debian !== undefined) this.datasets.set('debian', debian);
  }

  describe(distro: DistroName): string {
    return `memory:${distro}`;
  }

  async exists(distro: DistroName): Promise<boolean> {
    return this.datasets.has(distro);
  }

  async readLines(distro: DistroName): Promise<string[]> {
    const content = this.datasets.get(distro);
    if (content === undefined) {
      throw new DatasetSourceError(
        `Dataset not found: ${this.describe(distro)}`,
        'FILE_NOT_FOUND',
        this.describe(distro)
      );
    }
    return splitLines(content);
  }

  // ============================================
  // Testing utilities
  // ============================================

  setDataset(distro: DistroName, content: string): void {
    this.datasets.set(distro, content);
  }

  removeDataset(distro: DistroName): boolean {
    return this.datasets.delete(distro);
  }
}
