import type { HeaderOptions } from '../types/request.js';

function toEntries(headers?: HeaderOptions): Iterable<[string, string | null]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers || Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merges header sets left to right into a single `Headers` instance. Later
 * sets win, and a `null` value removes a header set earlier.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value === null) {
        merged.delete(key);
      } else {
        merged.set(key, value);
      }
    }
  }

  return merged;
}
