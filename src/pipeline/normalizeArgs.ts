import { ConflictingArgumentError } from '../error/conflictingArgumentError.js';
import { MissingArgumentError } from '../error/missingArgumentError.js';
import type { ApiArgs, ArgValue } from '../types/request.js';
import { isScalarList, joinList } from '../utils/encode.js';
import { isFilePart } from '../utils/fileUpload.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Name that stands for `screen_name` or `user_id`, chosen by the value. */
export const ID_SENTINEL = ':ID';

/** A positional argument or the trailing named-argument bag. */
export type PositionalArg = ArgValue | ApiArgs;

/** A call after positional arguments were folded into the named bag. */
export interface NormalizedCall {
  httpMethod: string;
  path: string;
  args: ApiArgs;
  /** Values following the named bag, passed through untouched. */
  extraArgs: PositionalArg[];
}

/** Whether a value is a named-argument bag rather than a positional value. */
export function isArgsBag(value: PositionalArg | undefined): value is ApiArgs {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isFilePart(value);
}

/** Names an `:ID` value: digits only means `user_id`, anything else `screen_name`. */
export function idArgName(value: unknown): 'user_id' | 'screen_name' {
  return /^\d+$/.test(String(value)) ? 'user_id' : 'screen_name';
}

/**
 * Folds required arguments, given positionally in `names` order or in a
 * trailing named bag, into a single named bag.
 *
 * @example
 * normalizePosArgs([':ID', 'status'], 'post', 'some/endpoint', 'alice', 'down the rabbit hole')
 * // => args { screen_name: 'alice', status: 'down the rabbit hole' }
 */
export function normalizePosArgs(
  names: readonly string[],
  httpMethod: string,
  path: string,
  ...values: PositionalArg[]
): SafeWrap<Error, NormalizedCall> {
  const pending = [...names];
  const args: Record<string, ApiArgs[string]> = {};
  const queue = [...values];

  let name = pending[0];
  let next = queue[0];
  while (name !== undefined && next !== undefined && !isArgsBag(next)) {
    args[name] = next;
    pending.shift();
    queue.shift();
    name = pending[0];
    next = queue[0];
  }

  const first = queue[0];
  const bag: Record<string, ApiArgs[string]> = isArgsBag(first) ? { ...first } : {};
  if (isArgsBag(first)) {
    queue.shift();
  }

  for (const required of pending) {
    let key = required;
    if (key === ID_SENTINEL) {
      key = Object.hasOwn(bag, 'screen_name') ? 'screen_name' : 'user_id';
      if (!Object.hasOwn(bag, key)) {
        return [new MissingArgumentError('missing required screen_name or user_id', ID_SENTINEL), null];
      }
    }

    if (!Object.hasOwn(bag, key)) {
      return [new MissingArgumentError(`missing required '${key}' arg`, key), null];
    }

    args[key] = bag[key];
    delete bag[key];
  }

  if (Object.hasOwn(args, ID_SENTINEL)) {
    const id = args[ID_SENTINEL];
    delete args[ID_SENTINEL];
    args[idArgName(id)] = id;
  }

  for (const [key, value] of Object.entries(bag)) {
    if (Object.hasOwn(args, key)) {
      return [new ConflictingArgumentError(`'${key}' specified in both positional and named args`, key), null];
    }

    args[key] = value;
  }

  return [null, { httpMethod, path, args, extraArgs: queue }];
}

/**
 * Joins array values of the given keys with commas, for API arguments that
 * take comma separated lists. Anything but a list of scalars is left alone.
 */
export function flattenListArgs(keys: string | readonly string[], args: ApiArgs): ApiArgs {
  const flattened: Record<string, ApiArgs[string]> = { ...args };

  for (const key of typeof keys === 'string' ? [keys] : keys) {
    const value = flattened[key];
    if (isScalarList(value)) {
      flattened[key] = joinList(value);
    }
  }

  return flattened;
}
