/**
 * Error codes for dataset loading.
 */
export type DatasetLoadErrorCode =
  | 'MALFORMED'
  | 'DUPLICATE_KEY';

/**
 * Error thrown when a dataset cannot be turned into series records.
 * Loading is all-or-nothing: no records are returned alongside it.
 */
export class DatasetLoadError extends Error {
  constructor(
    message: string,
    public readonly code: DatasetLoadErrorCode,
    /** 1-based line number in the source, when the error belongs to a line */
    public readonly line?: number,
    /** Repeated value for DUPLICATE_KEY */
    public readonly key?: string
  ) {
    super(message);
    this.name = 'DatasetLoadError';
  }
}
