/**
 * Error types for index build and query operations
 *
 * Invariants:
 * - Caller errors (unknown attribute, bad range, bad value) are raised before any index is read
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all homeindex errors
 */
export abstract class HomeIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a filter references a field that is not indexed
 */
export class UnknownAttributeError extends HomeIndexError {
  readonly code = "UNKNOWN_ATTRIBUTE";

  constructor(
    public readonly attribute: string,
    public readonly known: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Unknown attribute "${attribute}". Indexed attributes: ${known.join(", ")}`, options);
  }
}

/**
 * Thrown when a range predicate is malformed (min > max, non-numeric bound, empty range)
 */
export class InvalidRangeError extends HomeIndexError {
  readonly code = "INVALID_RANGE";

  constructor(
    public readonly attribute: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid range for "${attribute}": ${reason}`, options);
  }
}

/**
 * Thrown when an exact-value predicate has the wrong type for its attribute
 */
export class InvalidPredicateError extends HomeIndexError {
  readonly code = "INVALID_PREDICATE";

  constructor(
    public readonly attribute: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid predicate for "${attribute}": ${reason}`, options);
  }
}

/**
 * Thrown when the hash-set and posting-list paths disagree on a result.
 * This always indicates a build or intersection defect.
 */
export class ResultMismatchError extends HomeIndexError {
  readonly code = "RESULT_MISMATCH";

  constructor(
    public readonly onlyInHashSet: readonly number[],
    public readonly onlyInPostingList: readonly number[],
    options?: ErrorOptions
  ) {
    super(
      `Index paths disagree: ${onlyInHashSet.length} id(s) only in hash-set result, ` +
        `${onlyInPostingList.length} id(s) only in posting-list result`,
      options
    );
  }
}

/**
 * Thrown when a query is given two indexes built from different stores
 */
export class IncompatibleIndexesError extends HomeIndexError {
  readonly code = "INCOMPATIBLE_INDEXES";

  constructor(options?: ErrorOptions) {
    super("Hash-set and posting-list indexes were built from different property stores", options);
  }
}

/**
 * Thrown when a dataset record fails validation
 */
export class InvalidPropertyError extends HomeIndexError {
  readonly code = "INVALID_PROPERTY";

  constructor(
    public readonly position: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid property at position ${position}: ${reason}`, options);
  }
}

/**
 * Thrown when a dataset file cannot be read or parsed
 */
export class DatasetReadError extends HomeIndexError {
  readonly code = "DATASET_READ_ERROR";

  constructor(
    public readonly filePath: string,
    public readonly notFound: boolean,
    options?: ErrorOptions
  ) {
    super(notFound ? `Dataset not found: ${filePath}` : `Failed to read dataset: ${filePath}`, options);
  }
}

/**
 * Thrown when a proximity search names a home that does not exist or has no coordinates
 */
export class HomeNotLocatedError extends HomeIndexError {
  readonly code = "HOME_NOT_LOCATED";

  constructor(
    public readonly id: number,
    options?: ErrorOptions
  ) {
    super(`Home #${id} does not exist or has no coordinates`, options);
  }
}
