import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Type guard that matches `err` against an error class, following nested causes.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
