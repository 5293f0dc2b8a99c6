/**
 * Extensions entrypoint: middleware layered on the request pipeline and the
 * client variants for app-only auth and the stateful handshake.
 * @module
 */

export { AppAuthClient } from './appAuth.js';
export { decodeHtmlEntities } from './decodeHtmlEntities.js';
export { enchilada } from './enchilada.js';
export { type AuthUrlArgs, MigrationClient, type MigrationClientProps } from './migration.js';
export { BOOLEAN_ARGS, normalizeBooleans } from './normalizeBooleans.js';
export { type RateLimitingOptions, rateLimiting } from './rateLimiting.js';
export { backoffDelay, type RetryOnErrorOptions, retryOnError } from './retryOnError.js';
