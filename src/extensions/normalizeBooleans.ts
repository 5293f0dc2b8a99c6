import type { PipelineMiddleware } from '../core/types.js';
import { isScalar } from '../utils/encode.js';

/** Arguments the API reads as booleans, and only as `true` or `false`. */
export const BOOLEAN_ARGS: readonly string[] = [
  'all_replies',
  'contributor_details',
  'display_coordinates',
  'exclude_replies',
  'follow',
  'hide_media',
  'hide_thread',
  'include_card_uri',
  'include_email',
  'include_entities',
  'include_ext_alt_text',
  'include_followed_by',
  'include_my_retweet',
  'include_rts',
  'include_user_entities',
  'map',
  'omit_script',
  'possibly_sensitive',
  'retweets',
  'skip_status',
  'stringify_ids',
  'trim_user',
];

const FALSY: ReadonlySet<unknown> = new Set([false, 0, '', '0', 'false']);

/**
 * Rewrites known boolean arguments as `'true'` or `'false'`, so `1`, `0`,
 * `true` and `'false'` all reach the API the way it expects.
 */
export function normalizeBooleans(names: readonly string[] = BOOLEAN_ARGS): PipelineMiddleware {
  return {
    name: 'normalizeBooleans',
    beforeBuild(context) {
      for (const name of names) {
        const value = context.args[name];
        if (isScalar(value)) {
          context.args[name] = FALSY.has(value) ? 'false' : 'true';
        }
      }
    },
  };
}
