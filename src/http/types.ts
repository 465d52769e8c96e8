/**
 * HTTP types shared by protocols, signing and transports.
 *
 * @module http/types
 */

/**
 * HTTP methods an operation binding may use.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD';

/**
 * HTTP request structure.
 *
 * Handlers on `request-created` and `before-sign` may mutate headers in place.
 *
 * @example
 * ```typescript
 * const request: HttpRequest = {
 *   method: 'POST',
 *   url: 'https://widgets.us-west-2.amazonaws.com/',
 *   headers: {
 *     'content-type': 'application/x-amz-json-1.1',
 *     'x-amz-target': 'WidgetService_20240101.DescribeWidgets',
 *   },
 *   body: '{}',
 * };
 * ```
 */
export interface HttpRequest {
  method: HttpMethod;

  /**
   * Complete URL including scheme, host, path and query string.
   */
  url: string;

  /**
   * Header names are lowercase.
   */
  headers: Record<string, string>;

  body?: string;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse {
  /**
   * HTTP status code (e.g., 200, 400, 500).
   */
  status: number;

  /**
   * Header names are normalized to lowercase.
   */
  headers: Record<string, string>;

  /**
   * Empty string if no body is present.
   */
  body: string;
}

/**
 * Sends one HTTP exchange.
 *
 * Implementations raise {@link TransportError} when the exchange does not
 * complete; any response, whatever its status, is returned. A transport that
 * holds connections releases them in `close()`.
 *
 * @example
 * ```typescript
 * class RecordingTransport implements Transport {
 *   async send(request: HttpRequest): Promise<HttpResponse> {
 *     return { status: 200, headers: {}, body: '{}' };
 *   }
 * }
 * ```
 */
export interface Transport {
  send(request: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

/**
 * HTTP transport options.
 */
export interface TransportOptions {
  /**
   * Total request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /**
   * Connection establishment timeout in milliseconds.
   * @default 10000
   */
  connectTimeout?: number;
}
