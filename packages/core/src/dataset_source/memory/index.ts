export { MemoryDatasetSource } from './memory_dataset_source';
export type { MemoryDatasetSourceOptions } from '../dataset_source.types';
