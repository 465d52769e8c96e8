/**
 * Protocol-neutral request and response shapes.
 *
 * @module protocol/types
 */

import type { HttpMethod, HttpResponse } from '../http/types.js';
import type { OperationModel } from '../model/service.js';

/**
 * Serialized request, before an endpoint turns it into an HTTP request.
 *
 * `before-call` handlers may mutate it.
 */
export interface RequestEnvelope {
  method: HttpMethod;
  /** Path below the endpoint URL, starting with `/`; may carry a fixed query */
  urlPath: string;
  query: Record<string, string | string[]>;
  headers: Record<string, string>;
  body: string;
}

/**
 * Error reported by the service.
 */
export interface ParsedError {
  code: string;
  message: string;
  /** Fault side, e.g. `Sender` */
  type?: string;
}

/**
 * Result of parsing one HTTP response.
 */
export interface ParsedResponse {
  output: Record<string, unknown>;
  error?: ParsedError;
  requestId?: string;
}

/**
 * Metadata attached to every successful result.
 */
export interface ResponseMetadata {
  RequestId?: string;
  HTTPStatusCode: number;
  HTTPHeaders: Record<string, string>;
  RetryAttempts: number;
}

/**
 * Turns caller parameters into a request envelope.
 */
export interface Serializer {
  /**
   * @throws {ParamValidationError} If validation is enabled and the parameters are invalid
   */
  serialize(params: Record<string, unknown>, operation: OperationModel): RequestEnvelope;
}

/**
 * Turns an HTTP response into output or a service error.
 */
export interface ResponseParser {
  /**
   * @throws {TransportError} With reason `malformed-response` if a success body cannot be read
   */
  parse(response: HttpResponse, operation: OperationModel): ParsedResponse;
}
