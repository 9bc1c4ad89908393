export { FsDatasetSource } from './fs_dataset_source';
export type { FsDatasetSourceOptions } from '../dataset_source.types';
