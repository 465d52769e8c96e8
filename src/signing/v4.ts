/**
 * Signature Version 4.
 *
 * @module signing/v4
 */

import { createHash, createHmac } from 'node:crypto';
import type { AwsCredentials } from '../credentials/types.js';
import { SigningError } from '../error/index.js';
import type { HttpRequest } from '../http/types.js';
import { SigningKeyCache } from './cache.js';
import { canonicalHeaders, canonicalQueryString, createCanonicalRequest } from './canonical.js';

const ALGORITHM = 'AWS4-HMAC-SHA256';
const AWS4_REQUEST = 'aws4_request';

const sharedKeyCache = new SigningKeyCache();

export interface SigV4Params {
  credentials: AwsCredentials;
  region: string;
  /** Signing name of the service */
  service: string;
  /** Signing time; the current time when omitted */
  date?: Date;
  /** Add `x-amz-content-sha256` (the `s3v4` variant) */
  contentSha256Header?: boolean;
  cache?: SigningKeyCache;
}

export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmac(key: Buffer | string, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * `YYYYMMDD`
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * `YYYYMMDDTHHMMSSZ`
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

export function createStringToSign(datetime: string, scope: string, canonicalRequestHash: string): string {
  return [ALGORITHM, datetime, scope, canonicalRequestHash].join('\n');
}

/**
 * Derive the signing key:
 * HMAC(HMAC(HMAC(HMAC("AWS4" + secret, date), region), service), "aws4_request")
 */
export function deriveSigningKey(
  secret: string,
  date: string,
  region: string,
  service: string,
  cache: SigningKeyCache = sharedKeyCache
): Buffer {
  const cached = cache.get(secret, date, region, service);
  if (cached) {
    return cached;
  }
  const kDate = hmac(`AWS4${secret}`, date);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  const kSigning = hmac(kService, AWS4_REQUEST);
  cache.set(secret, date, region, service, kSigning);
  return kSigning;
}

export function buildAuthorizationHeader(
  accessKeyId: string,
  credentialScope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

/**
 * Sign a request in place: sets `host`, `x-amz-date`, the session token
 * header when present, and `authorization`.
 *
 * @throws {SigningError} If the URL is invalid or signing fails
 *
 * @example
 * ```typescript
 * signV4(request, {
 *   credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 *   region: 'us-west-2',
 *   service: 'widgets',
 * });
 * request.headers.authorization; // 'AWS4-HMAC-SHA256 Credential=test-access-key/...'
 * ```
 */
export function signV4(request: HttpRequest, params: SigV4Params): void {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch (error) {
    throw new SigningError(
      `Invalid request URL: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_URL'
    );
  }

  try {
    const date = params.date ?? new Date();
    const dateStr = formatDate(date);
    const datetime = formatDateTime(date);
    const headers = request.headers;

    delete headers.authorization;
    headers.host = url.host;
    headers['x-amz-date'] = datetime;
    if (params.credentials.sessionToken) {
      headers['x-amz-security-token'] = params.credentials.sessionToken;
    }

    const payloadHash = sha256Hex(request.body ?? '');
    if (params.contentSha256Header) {
      headers['x-amz-content-sha256'] = payloadHash;
    }

    const { canonical, signed } = canonicalHeaders(headers);
    const canonicalRequest = createCanonicalRequest(
      request.method,
      url.pathname,
      canonicalQueryString(url.searchParams),
      canonical,
      signed,
      payloadHash
    );

    const credentialScope = `${dateStr}/${params.region}/${params.service}/${AWS4_REQUEST}`;
    const stringToSign = createStringToSign(datetime, credentialScope, sha256Hex(canonicalRequest));
    const signingKey = deriveSigningKey(
      params.credentials.secretAccessKey,
      dateStr,
      params.region,
      params.service,
      params.cache
    );
    const signature = createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');

    headers.authorization = buildAuthorizationHeader(
      params.credentials.accessKeyId,
      credentialScope,
      signed,
      signature
    );
  } catch (error) {
    if (error instanceof SigningError) {
      throw error;
    }
    throw new SigningError(
      `Failed to sign request: ${error instanceof Error ? error.message : String(error)}`,
      'SIGNING_FAILED'
    );
  }
}

export function getSigningKeyCache(): SigningKeyCache {
  return sharedKeyCache;
}
