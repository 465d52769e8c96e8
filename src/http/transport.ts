/**
 * undici-based HTTP transport.
 *
 * @module http/transport
 */

import { Agent, request } from 'undici';
import { DEFAULT_CONNECT_TIMEOUT, DEFAULT_TIMEOUT } from '../config/index.js';
import { TransportError, type TransportFailureReason } from '../error/index.js';
import type { HttpRequest, HttpResponse, Transport, TransportOptions } from './types.js';

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'ETIMEDOUT',
]);

/**
 * Transport sending requests through an undici Agent.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport({ timeout: 30000, connectTimeout: 5000 });
 *
 * const response = await transport.send({
 *   method: 'POST',
 *   url: 'https://widgets.us-west-2.amazonaws.com/',
 *   headers: { 'content-type': 'application/x-amz-json-1.1' },
 *   body: '{}',
 * });
 * ```
 */
export class UndiciTransport implements Transport {
  private readonly timeout: number;
  private readonly agent: Agent;

  constructor(options: TransportOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.agent = new Agent({
      connect: { timeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT },
    });
  }

  /**
   * @throws {TransportError} If the exchange does not complete
   */
  async send(req: HttpRequest): Promise<HttpResponse> {
    let response: Awaited<ReturnType<typeof request>>;
    try {
      response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        dispatcher: this.agent,
        headersTimeout: this.timeout,
        bodyTimeout: this.timeout,
      });
    } catch (error) {
      throw toTransportError(error, req);
    }

    let body: string;
    try {
      body = await response.body.text();
    } catch (error) {
      throw toTransportError(error, req, 'malformed-response');
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        headers[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        headers[key.toLowerCase()] = value.join(', ');
      }
    }

    return { status: response.statusCode, headers, body };
  }

  /**
   * Close idle connections.
   */
  async close(): Promise<void> {
    await this.agent.close();
  }
}

/**
 * Classify a low-level failure.
 */
export function classifyTransportFailure(
  error: unknown,
  fallback: TransportFailureReason = 'connection'
): TransportFailureReason {
  const code = errorCode(error);
  if (code === undefined) {
    return fallback;
  }
  if (TIMEOUT_CODES.has(code)) {
    return 'timeout';
  }
  if (code.startsWith('HPE_') || code === 'UND_ERR_RES_CONTENT_LENGTH_MISMATCH') {
    return 'malformed-response';
  }
  return fallback;
}

function toTransportError(
  error: unknown,
  req: HttpRequest,
  fallback: TransportFailureReason = 'connection'
): TransportError {
  const reason = classifyTransportFailure(error, fallback);
  const detail = error instanceof Error ? error.message : String(error);
  return new TransportError(`${req.method} ${req.url} failed (${reason}): ${detail}`, reason, error);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
