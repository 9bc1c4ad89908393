/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for callers that bundle their own datasets.
 */

// DatasetSource
export { MemoryDatasetSource } from './dataset_source/memory';
export type { MemoryDatasetSourceOptions } from './dataset_source/memory';
