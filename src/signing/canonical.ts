/**
 * Canonical request building for Signature Version 4.
 *
 * @module signing/canonical
 */

import { SigningError } from '../error/index.js';

/**
 * URI-encode a string: every byte except unreserved characters
 * (A-Z, a-z, 0-9, `-`, `_`, `.`, `~`), spaces as `%20`.
 *
 * @example
 * ```typescript
 * uriEncode('hello world');         // 'hello%20world'
 * uriEncode('path/to/file', false); // 'path/to/file'
 * uriEncode('path/to/file');        // 'path%2Fto%2Ffile'
 * ```
 */
export function uriEncode(input: string, encodeSlash = true): string {
  return encodeURIComponent(input)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, encodeSlash ? '%2F' : '/');
}

/**
 * Canonical URI path. The path is taken as already encoded, so each segment
 * is decoded before being encoded once more.
 *
 * @example
 * ```typescript
 * canonicalPath('');                  // '/'
 * canonicalPath('/documents/a%20b');  // '/documents/a%20b'
 * ```
 */
export function canonicalPath(path: string): string {
  if (path === '' || path === '/') {
    return '/';
  }
  return path
    .split('/')
    .map((segment) => uriEncode(safeDecode(segment), false))
    .join('/');
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Sorted, encoded query string.
 *
 * @example
 * ```typescript
 * canonicalQueryString(new URLSearchParams('foo=bar&baz=qux')); // 'baz=qux&foo=bar'
 * ```
 */
export function canonicalQueryString(params: URLSearchParams): string {
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of params.entries()) {
    pairs.push([uriEncode(key), uriEncode(value)]);
  }
  pairs.sort((a, b) => {
    if (a[0] !== b[0]) {
      return a[0] < b[0] ? -1 : 1;
    }
    return a[1] < b[1] ? -1 : a[1] > b[1] ? 1 : 0;
  });
  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
}

const SIGNED_HEADERS = new Set(['host', 'content-type', 'content-md5']);

/**
 * Whether a header takes part in the signature: `host`, `content-type`,
 * `content-md5` and every `x-amz-*` header.
 *
 * @example
 * ```typescript
 * shouldSignHeader('x-amz-date');    // true
 * shouldSignHeader('user-agent');    // false
 * shouldSignHeader('authorization'); // false
 * ```
 */
export function shouldSignHeader(name: string): boolean {
  const lower = name.toLowerCase();
  if (lower === 'authorization' || lower === 'user-agent' || lower === 'amz-sdk-invocation-id') {
    return false;
  }
  return SIGNED_HEADERS.has(lower) || lower.startsWith('x-amz-');
}

/**
 * Canonical headers block and signed header list.
 *
 * @throws {SigningError} If the `host` header is missing
 *
 * @example
 * ```typescript
 * canonicalHeaders({ host: 'widgets.us-west-2.amazonaws.com', 'x-amz-date': '20240102T030405Z' });
 * // {
 * //   canonical: 'host:widgets.us-west-2.amazonaws.com\nx-amz-date:20240102T030405Z\n',
 * //   signed: 'host;x-amz-date'
 * // }
 * ```
 */
export function canonicalHeaders(headers: Record<string, string>): { canonical: string; signed: string } {
  const selected = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    if (shouldSignHeader(name)) {
      const lower = name.toLowerCase();
      const normalized = value.trim().replace(/\s+/g, ' ');
      const existing = selected.get(lower);
      selected.set(lower, existing === undefined ? normalized : `${existing},${normalized}`);
    }
  }

  if (!selected.has('host')) {
    throw new SigningError('Missing required header: host', 'MISSING_HEADER');
  }

  const sorted = Array.from(selected.entries()).sort((a, b) => (a[0] < b[0] ? -1 : 1));
  return {
    canonical: sorted.map(([name, value]) => `${name}:${value}`).join('\n') + '\n',
    signed: sorted.map(([name]) => name).join(';'),
  };
}

/**
 * ```
 * METHOD\nCanonicalURI\nCanonicalQuery\nCanonicalHeaders\nSignedHeaders\nPayloadHash
 * ```
 */
export function createCanonicalRequest(
  method: string,
  path: string,
  query: string,
  headers: string,
  signedHeaders: string,
  payloadHash: string
): string {
  return [method.toUpperCase(), canonicalPath(path), query, headers, signedHeaders, payloadHash].join('\n');
}
