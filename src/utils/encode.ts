import type { Scalar } from '../types/request.js';

/**
 * Percent-encodes a value per RFC 3986: everything except unreserved
 * characters (`A-Z a-z 0-9 - . _ ~`) is escaped, spaces become `%20`.
 * This is the encoding OAuth 1.0a signatures are computed over.
 */
export function percentEncode(value: Scalar): string {
  return encodeURIComponent(String(value)).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Encodes an argument map as `key=value` pairs joined with `&`, with keys
 * sorted so the output does not depend on insertion order.
 */
export function encodeArgsString(args: Readonly<Record<string, Scalar>>): string {
  return Object.keys(args)
    .sort()
    .map((key) => `${percentEncode(key)}=${percentEncode(args[key])}`)
    .join('&');
}

/** Whether a value encodes to a single string on the wire. */
export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Whether a value is a list of scalars. */
export function isScalarList(value: unknown): value is ReadonlyArray<Scalar> {
  return Array.isArray(value) && value.every(isScalar);
}

/** Joins list values with commas, the API's convention for list arguments. */
export function joinList(values: ReadonlyArray<Scalar>): string {
  return values.map(String).join(',');
}

/**
 * Decodes an `application/x-www-form-urlencoded` body. Keys that appear more
 * than once collect their values in an array.
 */
export function decodeFormData(body: string): Record<string, string | string[]> {
  const decoded: Record<string, string | string[]> = {};

  for (const [key, value] of new URLSearchParams(body)) {
    const existing = decoded[key];
    if (existing === undefined) {
      decoded[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      decoded[key] = [existing, value];
    }
  }

  return decoded;
}
