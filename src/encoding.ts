/**
 * Path segment encoding for GitLab API URLs.
 * @module encoding
 */

import { ConfigError } from './errors.js';

const UNRESERVED = /^[A-Za-z0-9._~-]$/;

// A high surrogate not followed by a low one, or a low one not preceded by a high one.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const utf8 = new TextEncoder();

/**
 * Percent-encode a string for use as a single URL path segment.
 *
 * Every UTF-8 byte outside `[A-Za-z0-9._~-]` becomes `%xx` with lowercase hex,
 * so `group/project` becomes `group%2fproject`.
 *
 * @throws {ConfigError} If the string contains an unpaired UTF-16 surrogate,
 * which has no UTF-8 encoding
 */
export function encodePathSegment(value: string): string {
  if (LONE_SURROGATE.test(value)) {
    throw new ConfigError(`Path segment is not valid Unicode: ${JSON.stringify(value)}`);
  }
  let encoded = '';
  for (const char of value) {
    if (UNRESERVED.test(char)) {
      encoded += char;
      continue;
    }
    for (const byte of utf8.encode(char)) {
      encoded += `%${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return encoded;
}
