/**
 * Joins URL segments with single slashes and appends an extension. When the
 * last segment is already an absolute URL it is returned unchanged.
 *
 * @example
 * urlFor('.json', 'https://api.x.com/', '1.1', '/statuses/show')
 * // => 'https://api.x.com/1.1/statuses/show.json'
 */
export function urlFor(ext: string, ...parts: string[]): string {
  const last = parts[parts.length - 1];
  if (last !== undefined && isAbsoluteUrl(last)) {
    return last;
  }

  const joined = parts
    .map((part, i) => (i === 0 ? part.replace(/\/+$/, '') : part.replace(/^\/+|\/+$/g, '')))
    .filter((part) => part.length > 0)
    .join('/');

  return `${joined}${ext}`;
}

/** Whether a URL already carries a scheme and needs no base URL. */
export function isAbsoluteUrl(url: string): boolean {
  return /^https?:\/\//i.test(url);
}
