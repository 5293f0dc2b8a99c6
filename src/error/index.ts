/**
 * Error entrypoint: the error kinds the client returns and helpers for
 * identifying and unwrapping them through `cause` chains.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ApiError, getApiError, isApiError, TOKEN_ERROR_CODES } from './apiError.js';
export {
  ConflictingArgumentError,
  getConflictingArgumentError,
  isConflictingArgumentError,
} from './conflictingArgumentError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
export { getMissingArgumentError, isMissingArgumentError, MissingArgumentError } from './missingArgumentError.js';
export {
  type CredentialName,
  getMissingCredentialError,
  isMissingCredentialError,
  MissingCredentialError,
} from './missingCredentialError.js';
export {
  getMissingPathArgumentError,
  isMissingPathArgumentError,
  MissingPathArgumentError,
} from './missingPathArgumentError.js';
export { getRequestBuildError, isRequestBuildError, RequestBuildError } from './requestBuildError.js';
export {
  getRetryExhaustedError,
  getRetrySuppressedError,
  isRetryExhaustedError,
  isRetrySuppressedError,
  RetryExhaustedError,
  RetrySuppressedError,
} from './retryError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
