/**
 * Scalar conversions shared by the protocol bodies.
 *
 * @module protocol/values
 */

import { TransportError } from '../error/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a caller-supplied timestamp to a Date.
 */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'number') {
    return new Date(value * 1000);
  }
  if (typeof value === 'string') {
    const numeric = Number(value);
    const date = value.trim() !== '' && !Number.isNaN(numeric) ? new Date(numeric * 1000) : new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

/**
 * Seconds since the epoch, with fractional milliseconds.
 */
export function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}

/**
 * ISO 8601 without milliseconds when they are zero.
 */
export function toIso8601(date: Date): string {
  return date.toISOString().replace('.000Z', 'Z');
}

export function encodeBlob(value: unknown): string {
  if (typeof value === 'string') {
    return Buffer.from(value, 'utf8').toString('base64');
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return '';
}

export function decodeBlob(value: unknown): Buffer {
  return Buffer.from(typeof value === 'string' ? value : '', 'base64');
}

/**
 * Parse JSON from a response body. An empty body is an empty object.
 *
 * @throws {TransportError} With reason `malformed-response` if the body is not JSON
 */
export function parseJsonBody(body: string): unknown {
  if (body.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Malformed JSON response body: ${reason}`, 'malformed-response', error);
  }
}

/**
 * Strip namespaces and suffixes from JSON protocol error codes:
 * `aws.widgets#WidgetNotFound:http://...` becomes `WidgetNotFound`.
 */
export function normalizeErrorCode(raw: string): string {
  const withoutSuffix = raw.split(':')[0] ?? raw;
  const hash = withoutSuffix.lastIndexOf('#');
  return hash === -1 ? withoutSuffix : withoutSuffix.slice(hash + 1);
}
