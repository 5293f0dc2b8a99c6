import { decodeHTML } from 'entities';
import type { PipelineMiddleware } from '../core/types.js';
import type { JsonValue } from '../types/request.js';

function decodeAll(value: JsonValue): JsonValue {
  if (typeof value === 'string') {
    return decodeHTML(value);
  }

  if (Array.isArray(value)) {
    return value.map(decodeAll);
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]): [string, JsonValue] => [key, decodeAll(item)]));
  }

  return value;
}

/**
 * Decodes HTML entities (`&amp;`, `&lt;`, `&gt;`...) in every string of a
 * successful result. Tweet text arrives entity-encoded.
 */
export function decodeHtmlEntities(): PipelineMiddleware {
  return {
    name: 'decodeHtmlEntities',
    afterInflate(context) {
      if (context.result !== undefined) {
        context.result = decodeAll(context.result);
      }
    },
  };
}
