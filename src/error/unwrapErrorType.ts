/** Any error class, whatever its constructor takes. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Walks an error and its `cause` chain and returns the first link that is an
 * instance of `errorClass`, or `null` when there is none.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const visited = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !visited.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    visited.add(current);
    current = current.cause;
  }

  return null;
}
