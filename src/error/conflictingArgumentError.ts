import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an argument was supplied both positionally and in the named bag.
 */
export class ConflictingArgumentError extends Error {
  /** ConflictingArgumentError error-name */
  static name = 'ConflictingArgumentError';
  /** Name of the offending argument */
  #argument: string;

  /** Creates a new instance of a ConflictingArgumentError for the given argument name */
  constructor(message: string, argument: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#argument = argument;
  }

  /** Name of the offending argument */
  get argument(): string {
    return this.#argument;
  }
}

/**
 * Type guard for {@link ConflictingArgumentError}.
 */
export function isConflictingArgumentError(error: unknown): error is ConflictingArgumentError {
  return isErrorType(ConflictingArgumentError, error);
}

/**
 * Extract a {@link ConflictingArgumentError} from an unknown error value, following nested causes.
 */
export function getConflictingArgumentError(error: unknown): null | ConflictingArgumentError {
  return unwrapErrorType(ConflictingArgumentError, error);
}
