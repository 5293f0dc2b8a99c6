import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a required argument was supplied neither positionally nor in the named bag.
 */
export class MissingArgumentError extends Error {
  /** MissingArgumentError error-name */
  static name = 'MissingArgumentError';
  /** Name of the offending argument */
  #argument: string;

  /** Creates a new instance of a MissingArgumentError for the given argument name */
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
 * Type guard for {@link MissingArgumentError}.
 */
export function isMissingArgumentError(error: unknown): error is MissingArgumentError {
  return isErrorType(MissingArgumentError, error);
}

/**
 * Extract a {@link MissingArgumentError} from an unknown error value, following nested causes.
 */
export function getMissingArgumentError(error: unknown): null | MissingArgumentError {
  return unwrapErrorType(MissingArgumentError, error);
}
