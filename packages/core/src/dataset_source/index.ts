export type { DatasetSource } from './dataset_source';
export { DatasetSourceError } from './dataset_source.errors';
export type { DatasetSourceErrorCode } from './dataset_source.errors';
export { DEFAULT_DATA_DIR } from './dataset_source.types';
export type { FsDatasetSourceOptions, MemoryDatasetSourceOptions } from './dataset_source.types';
