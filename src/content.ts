import { z } from 'zod';

import { parseWith } from './json.js';

/**
 * Message payload: plain text, or a multi-part array whose elements are kept
 * verbatim and never interpreted.
 *
 * The wire format has no tag for this field, so the form is decided by the
 * JSON kind alone. Anything that is not literally a string or an array is
 * rejected.
 */
export type Content = string | unknown[];

export const ContentSchema = z.union([z.string(), z.array(z.unknown())], {
  errorMap: () => ({ message: 'expected a string or an array' }),
});

export function decodeContent(value: unknown, path = 'content'): Content {
  return parseWith(ContentSchema, value, path);
}

export function encodeContent(content: Content): Content {
  return typeof content === 'string' ? content : [...content];
}

export function isTextContent(content: Content): content is string {
  return typeof content === 'string';
}
