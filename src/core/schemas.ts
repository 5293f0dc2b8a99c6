import { z } from 'zod';
import { VERSION } from '../version.js';

/**
 * Client configuration. Everything but the consumer pair has a default.
 */
export const clientConfigSchema = z.object({
  consumerKey: z.string().min(1),
  consumerSecret: z.string().min(1),
  accessToken: z.string().min(1).optional(),
  accessTokenSecret: z.string().min(1).optional(),
  apiUrl: z.string().url().default('https://api.x.com'),
  uploadUrl: z.string().url().default('https://upload.x.com'),
  apiVersion: z.string().default('1.1'),
  apiExt: z.string().default('.json'),
  agent: z.string().min(1).default(`x-api-client/${VERSION} (Node.js)`),
  /** Request timeout in milliseconds; `false` or `0` disables it. */
  timeout: z.union([z.number().int().nonnegative(), z.literal(false)]).default(10_000),
  /** Merged over the built-in headers; `null` removes a header. */
  defaultHeaders: z.record(z.string(), z.string().nullable()).default({}),
});

/** Configuration as passed in by callers. */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
/** Configuration with defaults applied. */
export type ClientConfig = z.output<typeof clientConfigSchema>;

/**
 * Per-call options, given in the argument bag with a leading `-`
 * (`-accept`, `-token`, ...). Unknown options pass through for middleware.
 */
export const requestOptionsSchema = z
  .object({
    accept: z.string().optional(),
    token: z.string().optional(),
    token_secret: z.string().optional(),
    oauth_args: z.record(z.string(), z.string()).optional(),
    to_json: z.unknown().optional(),
    multipart_form_data: z.boolean().optional(),
    add_consumer_auth_header: z.boolean().optional(),
  })
  .passthrough();

export type RequestOptions = z.output<typeof requestOptionsSchema>;

/** `oauth/request_token` response */
export const requestTokenSchema = z.object({
  oauth_token: z.string(),
  oauth_token_secret: z.string(),
  oauth_callback_confirmed: z.string().optional(),
});

export type RequestToken = z.output<typeof requestTokenSchema>;

/** `oauth/access_token` response, also returned by xAuth */
export const accessTokenSchema = z.object({
  oauth_token: z.string(),
  oauth_token_secret: z.string(),
  user_id: z.string().optional(),
  screen_name: z.string().optional(),
});

export type AccessToken = z.output<typeof accessTokenSchema>;

/** `oauth2/token` response */
export const bearerTokenSchema = z.object({
  token_type: z.string().optional(),
  access_token: z.string(),
});

export type BearerToken = z.output<typeof bearerTokenSchema>;

/** `oauth2/invalidate_token` response */
export const invalidatedTokenSchema = z.object({
  access_token: z.string(),
});
