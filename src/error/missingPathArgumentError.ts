import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a `:name` placeholder in a path template has no matching argument.
 */
export class MissingPathArgumentError extends Error {
  /** MissingPathArgumentError error-name */
  static name = 'MissingPathArgumentError';
  /** Placeholder that could not be filled */
  #argument: string;
  /** Path template being expanded */
  #url: string;

  /** Creates a new instance of a MissingPathArgumentError for a placeholder within a path template */
  constructor(message: string, argument: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#argument = argument;
    this.#url = url;
  }

  /** Placeholder that could not be filled */
  get argument(): string {
    return this.#argument;
  }

  /** Path template being expanded */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link MissingPathArgumentError}.
 */
export function isMissingPathArgumentError(error: unknown): error is MissingPathArgumentError {
  return isErrorType(MissingPathArgumentError, error);
}

/**
 * Extract a {@link MissingPathArgumentError} from an unknown error value, following nested causes.
 */
export function getMissingPathArgumentError(error: unknown): null | MissingPathArgumentError {
  return unwrapErrorType(MissingPathArgumentError, error);
}
