/**
 * Error Taxonomy
 *
 * Fatal errors abort the whole query and name the resource at fault.
 * Empty results are not errors: see `EmptyResultWarning` in pipeline/types.
 *
 * @module errors
 */

/**
 * The corpus and its auxiliary data disagree (e.g. documents vs abstracts count),
 * or a corpus file does not match its schema.
 */
export class DataConsistencyError extends Error {
  constructor(
    message: string,
    public readonly expected?: number,
    public readonly actual?: number
  ) {
    super(message);
    this.name = 'DataConsistencyError';
  }
}

/**
 * The user-supplied library file is missing, unreadable or holds no usable entries.
 */
export class InputLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InputLoadError';
  }
}

/**
 * A required resource (corpus snapshot, retrieval index) is absent.
 */
export class MissingDependencyError extends Error {
  constructor(public readonly resource: string) {
    super(`Required resource is missing: ${resource}`);
    this.name = 'MissingDependencyError';
  }
}

/**
 * Check whether an error is one of the fatal loading errors above.
 */
export function isFatalLoadError(
  error: unknown
): error is DataConsistencyError | InputLoadError | MissingDependencyError {
  return (
    error instanceof DataConsistencyError ||
    error instanceof InputLoadError ||
    error instanceof MissingDependencyError
  );
}
