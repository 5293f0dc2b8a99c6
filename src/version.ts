/** Package version, sent in the default `User-Agent` and `X-Twitter-Client-Version` headers. */
export const VERSION = '1.0.0';
