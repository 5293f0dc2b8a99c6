import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Credential a protected request could not resolve */
export type CredentialName = 'token' | 'token_secret';

/**
 * Error raised when a protected resource is requested without an access token or secret.
 */
export class MissingCredentialError extends Error {
  /** MissingCredentialError error-name */
  static name = 'MissingCredentialError';
  /** The credential that was missing */
  #credential: CredentialName;

  /** Creates a new instance of a MissingCredentialError naming the missing credential */
  constructor(message: string, credential: CredentialName, opts?: ErrorOptions) {
    super(message, opts);
    this.#credential = credential;
  }

  /** The credential that was missing */
  get credential(): CredentialName {
    return this.#credential;
  }
}

/**
 * Type guard for {@link MissingCredentialError}.
 */
export function isMissingCredentialError(error: unknown): error is MissingCredentialError {
  return isErrorType(MissingCredentialError, error);
}

/**
 * Extract a {@link MissingCredentialError} from an unknown error value, following nested causes.
 */
export function getMissingCredentialError(error: unknown): null | MissingCredentialError {
  return unwrapErrorType(MissingCredentialError, error);
}
