/**
 * Event names, scopes and payloads.
 *
 * @module events/types
 */

import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { OperationModel } from '../model/service.js';
import type { ParsedResponse, RequestEnvelope } from '../protocol/types.js';
import type { RetryDecision } from '../retry/types.js';
import type { RequestSigner } from '../signing/signer.js';
import type { TransportError } from '../error/index.js';

/**
 * Scope an event is emitted in.
 */
export interface EventScope {
  /** Endpoint prefix of the emitting client */
  service?: string;
  /** Operation name, e.g. `DescribeWidgets` */
  operation?: string;
}

/**
 * What a handler subscribes to. Omitted scope fields match anything.
 *
 * @example
 * ```typescript
 * const everyRetry: EventPattern<'needs-retry'> = { event: 'needs-retry' };
 * const widgetsOnly: EventPattern<'needs-retry'> = { event: 'needs-retry', service: 'widgets' };
 * ```
 */
export interface EventPattern<E extends EventName = EventName> extends EventScope {
  event: E;
}

/**
 * Signing details shared by `before-sign` and `after-sign`.
 */
export interface SignEventPayload {
  request: HttpRequest;
  operationName: string;
  signatureVersion: string;
  signingName: string;
  regionName?: string;
}

/**
 * Payload of each event. Handlers may mutate payload values in place.
 */
export interface EventPayloads {
  'before-parameter-build': {
    params: Record<string, unknown>;
    model: OperationModel;
  };
  'before-call': {
    params: RequestEnvelope;
    model: OperationModel;
    requestSigner: RequestSigner;
  };
  'request-created': {
    request: HttpRequest;
    operationName: string;
  };
  'before-sign': SignEventPayload;
  'after-sign': SignEventPayload;
  'needs-retry': {
    /** 1-based number of the attempt that just finished */
    attempt: number;
    operationName: string;
    request: HttpRequest;
    response?: { http: HttpResponse; parsed: ParsedResponse };
    error?: TransportError;
  };
  'after-call': {
    httpResponse: HttpResponse;
    parsed: ParsedResponse;
    model: OperationModel;
  };
}

export type EventName = keyof EventPayloads;

/**
 * What handlers of each event may answer. Only `needs-retry` handlers answer.
 */
export interface EventResponses {
  'before-parameter-build': never;
  'before-call': never;
  'request-created': never;
  'before-sign': never;
  'after-sign': never;
  'needs-retry': RetryDecision;
  'after-call': never;
}

/**
 * Context passed to every handler alongside the payload.
 */
export interface EventContext<E extends EventName = EventName> {
  event: E;
  scope: EventScope;
}

export type EventHandler<E extends EventName> = (
  payload: EventPayloads[E],
  context: EventContext<E>
) => EventResponses[E] | void | Promise<EventResponses[E] | void>;
