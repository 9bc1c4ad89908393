/**
 * Error codes for DatasetSource operations.
 */
export type DatasetSourceErrorCode =
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_ERROR';

/**
 * Error thrown when a dataset cannot be read.
 */
export class DatasetSourceError extends Error {
  constructor(
    message: string,
    public readonly code: DatasetSourceErrorCode,
    public readonly location?: string
  ) {
    super(message);
    this.name = 'DatasetSourceError';
  }
}
