/**
 * Endpoint: a base URL bound to a transport, running the attempt loop of
 * one call.
 *
 * @module endpoint/endpoint
 */

import { v4 as uuidv4 } from 'uuid';
import { TransportError } from '../error/index.js';
import type { EventEmitter } from '../events/emitter.js';
import type { EventScope } from '../events/types.js';
import { classifyTransportFailure } from '../http/transport.js';
import type { HttpRequest, HttpResponse, Transport } from '../http/types.js';
import type { OperationModel } from '../model/service.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { ParsedResponse, RequestEnvelope, ResponseParser } from '../protocol/types.js';
import { defaultSleep, type Sleep } from '../retry/types.js';
import { uriEncode } from '../signing/canonical.js';

export interface EndpointOptions {
  /** Base URL, e.g. `https://widgets.us-west-2.amazonaws.com` */
  host: string;
  transport: Transport;
  userAgent: string;
  logger?: Logger;
  sleep?: Sleep;
  /** Source of `amz-sdk-invocation-id` values */
  invocationId?: () => string;
}

/**
 * Per-call inputs to {@link Endpoint.makeRequest}. The emitter belongs to the
 * calling client, so clones sharing an endpoint keep their own handlers.
 */
export interface EndpointCall {
  operation: OperationModel;
  envelope: RequestEnvelope;
  parser: ResponseParser;
  events: EventEmitter;
  scope: EventScope;
}

export interface EndpointResult {
  http: HttpResponse;
  parsed: ParsedResponse;
  /** Number of attempts made, at least 1 */
  attempts: number;
}

function buildQueryString(query: RequestEnvelope['query']): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      parts.push(`${uriEncode(key)}=${uriEncode(item)}`);
    }
  }
  return parts.join('&');
}

/**
 * @example
 * ```typescript
 * const endpoint = new Endpoint({
 *   host: 'https://widgets.us-west-2.amazonaws.com',
 *   transport: new UndiciTransport(),
 *   userAgent: 'model-client/0.1.0',
 * });
 * const { parsed, attempts } = await endpoint.makeRequest({ operation, envelope, parser, events, scope });
 * ```
 */
export class Endpoint {
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly invocationId: () => string;

  constructor(private readonly options: EndpointOptions) {
    this.logger = options.logger ?? new NoopLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.invocationId = options.invocationId ?? (() => uuidv4());
  }

  get host(): string {
    return this.options.host;
  }

  get transport(): Transport {
    return this.options.transport;
  }

  /**
   * Build the HTTP request for one attempt.
   */
  createRequest(envelope: RequestEnvelope, attempt: number, invocationId: string): HttpRequest {
    const base = this.options.host.replace(/\/+$/, '');
    const path = envelope.urlPath.startsWith('/') ? envelope.urlPath : `/${envelope.urlPath}`;
    const query = buildQueryString(envelope.query);

    const request: HttpRequest = {
      method: envelope.method,
      url: query === '' ? `${base}${path}` : `${base}${path}?${query}`,
      headers: {
        ...envelope.headers,
        'user-agent': this.options.userAgent,
        'amz-sdk-invocation-id': invocationId,
        'amz-sdk-request': `attempt=${attempt}`,
      },
    };
    if (envelope.body !== '') {
      request.body = envelope.body;
    }
    return request;
  }

  /**
   * Send a request, retrying as `needs-retry` handlers decide.
   *
   * @throws {TransportError} The last transport failure when no retry follows it
   */
  async makeRequest(call: EndpointCall): Promise<EndpointResult> {
    const { operation, envelope, parser, events, scope } = call;
    const invocationId = this.invocationId();

    for (let attempt = 1; ; attempt++) {
      const request = this.createRequest(envelope, attempt, invocationId);
      await events.emit('request-created', scope, { request, operationName: operation.name });

      let outcome: { http: HttpResponse; parsed: ParsedResponse } | undefined;
      let failure: TransportError | undefined;
      try {
        const http = await this.send(request);
        outcome = { http, parsed: parser.parse(http, operation) };
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        failure = error;
      }

      const decision = await events.emitUntilResponse('needs-retry', scope, {
        attempt,
        operationName: operation.name,
        request,
        response: outcome,
        error: failure,
      });

      if (decision?.kind === 'retry') {
        this.logger.debug('Retrying request', {
          operation: operation.name,
          attempt,
          delayMs: decision.delayMs,
          reason: failure ? failure.reason : outcome?.parsed.error?.code,
        });
        await this.sleep(decision.delayMs);
        continue;
      }

      if (outcome) {
        return { ...outcome, attempts: attempt };
      }
      throw failure ?? new TransportError(`${operation.name} produced no response`, 'connection');
    }
  }

  private async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      return await this.options.transport.send(request);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = classifyTransportFailure(error);
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${request.method} ${request.url} failed (${reason}): ${detail}`, reason, error);
    }
  }
}
