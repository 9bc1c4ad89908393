/**
 * Dataset Loader - turns distro-info CSV lines into DistroRelease records.
 *
 * @module dataset_loader
 * @example
 * ```typescript
 * import { Dataset, Releases } from '@distro-info/core';
 *
 * const releases = Dataset.loadDataset(lines, { variant: Releases.UBUNTU_VARIANT });
 * ```
 */

export { loadDataset, serializeDataset, splitLines } from './dataset_loader';
export { DatasetLoadError } from './dataset_loader.errors';
export type { DatasetLoadErrorCode } from './dataset_loader.errors';
export { REQUIRED_COLUMNS } from './dataset_loader.types';
export type { LoadDatasetOptions, OptionalDateField } from './dataset_loader.types';
