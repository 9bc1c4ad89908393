/**
 * Error codes for status evaluation.
 */
export type EvaluationErrorCode =
  | 'NOT_FOUND'
  | 'INCONSISTENT_DATA';

/**
 * Error thrown when a query has no answer, or when the dataset breaks an
 * ordering invariant the engine depends on.
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: EvaluationErrorCode,
    public readonly predicate?: string
  ) {
    super(message);
    this.name = 'EvaluationError';
  }
}

export function isNotFound(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError && error.code === 'NOT_FOUND';
}
