/**
 * HTTP module.
 *
 * @module http
 */

export type { HttpMethod, HttpRequest, HttpResponse, Transport, TransportOptions } from './types.js';
export { UndiciTransport, classifyTransportFailure } from './transport.js';
