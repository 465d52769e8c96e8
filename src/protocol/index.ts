/**
 * Protocol module.
 *
 * @module protocol
 */

export type {
  ParsedError,
  ParsedResponse,
  RequestEnvelope,
  ResponseMetadata,
  ResponseParser,
  Serializer,
} from './types.js';
export { JsonSerializer, JsonResponseParser } from './json.js';
export { RestJsonSerializer, RestJsonResponseParser } from './rest-json.js';
export { QuerySerializer, QueryResponseParser, flattenQueryParams } from './query.js';
export {
  createSerializer,
  createResponseParser,
  supportedProtocols,
  ValidatingSerializer,
} from './factory.js';
