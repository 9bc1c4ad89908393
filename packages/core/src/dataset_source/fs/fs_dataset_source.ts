/**
 * FsDatasetSource - Filesystem-based DatasetSource implementation
 *
 * Reads `<dataDir>/<distro>.csv`, the layout distro-info-data installs.
 * Used by the CLI.
 *
 * @module dataset_source/fs/fs_dataset_source
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { DistroName } from '../../distro_release';
import { splitLines } from '../../dataset_loader';
import { createLogger } from '../../logger';
import type { DatasetSource } from '../dataset_source';
import { DatasetSourceError } from '../dataset_source.errors';
import { DEFAULT_DATA_DIR } from '../dataset_source.types';
import type { FsDatasetSourceOptions } from '../dataset_source.types';

const logger = createLogger('[FsDatasetSource] ');

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Filesystem-based DatasetSource.
 *
 * @example
 * ```typescript
 * const source = new FsDatasetSource({ dataDir: '/usr/share/distro-info' });
 * const lines = await source.readLines('debian');
 * ```
 */
export class FsDatasetSource implements DatasetSource {
  private readonly dataDir: string;

  constructor(options: FsDatasetSourceOptions = {}) {
    this.dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
  }

  describe(distro: DistroName): string {
    return path.join(this.dataDir, `${distro}.csv`);
  }

  async exists(distro: DistroName): Promise<boolean> {
    try {
      await fs.access(this.describe(distro));
      return true;
    } catch {
      return false;
    }
  }

  async readLines(distro: DistroName): Promise<string[]> {
    const filePath = this.describe(distro);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw new DatasetSourceError(`Dataset not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      }
      if (code === 'EACCES') {
        throw new DatasetSourceError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      }
      throw new DatasetSourceError(
        `Read error: ${error instanceof Error ? error.message : String(error)}`,
        'READ_ERROR',
        filePath
      );
    }

    logger.debug(`Read ${content.length} bytes from ${filePath}`);
    return splitLines(content);
  }
}
