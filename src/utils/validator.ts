import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

type Output<T extends StandardSchemaV1> = StandardSchemaV1.InferOutput<T>;

/**
 * Turns a settled Standard Schema result into a tuple-style result.
 */
function settle<O>(result: StandardSchemaV1.Result<O>): SafeWrap<Error, O> {
  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}

/**
 * Validates an input value against a Standard Schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * - A throwing schema yields a `ValidationError` with the thrown error as `cause`.
 * - Async schemas are awaited.
 * - Issues are reported as a `ValidationError` carrying them.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<Error, Output<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => result);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    return settle(resultAsync);
  }

  return settle(result);
}

/**
 * Synchronous variant of {@link validator}, used where the pipeline cannot
 * suspend (configuration and per-call options). Async schemas are rejected.
 */
export function validateSync<T extends StandardSchemaV1>(input: unknown, schema: T): SafeWrap<Error, Output<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    return [new ValidationError('error validating data, schema is async', []), null];
  }

  return settle(result);
}
