/**
 * Serializer and parser factories keyed by protocol name.
 *
 * @module protocol/factory
 */

import { ConfigurationError } from '../error/index.js';
import type { OperationModel } from '../model/service.js';
import { ParamValidator } from '../validation/validator.js';
import { JsonResponseParser, JsonSerializer } from './json.js';
import { QueryResponseParser, QuerySerializer } from './query.js';
import { RestJsonResponseParser, RestJsonSerializer } from './rest-json.js';
import type { RequestEnvelope, ResponseParser, Serializer } from './types.js';

const SERIALIZERS: Record<string, () => Serializer> = {
  json: () => new JsonSerializer(),
  'rest-json': () => new RestJsonSerializer(),
  query: () => new QuerySerializer(),
};

const PARSERS: Record<string, () => ResponseParser> = {
  json: () => new JsonResponseParser(),
  'rest-json': () => new RestJsonResponseParser(),
  query: () => new QueryResponseParser(),
};

/**
 * Serializer that validates parameters before delegating.
 */
export class ValidatingSerializer implements Serializer {
  constructor(
    private readonly inner: Serializer,
    private readonly validator: ParamValidator = new ParamValidator()
  ) {}

  serialize(params: Record<string, unknown>, operation: OperationModel): RequestEnvelope {
    this.validator.assertValid(params, operation.inputShape);
    return this.inner.serialize(params, operation);
  }
}

export function supportedProtocols(): string[] {
  return Object.keys(SERIALIZERS);
}

/**
 * @param options.validate - Wrap in a {@link ValidatingSerializer} (default true)
 * @throws {ConfigurationError} If the protocol is unknown
 *
 * @example
 * ```typescript
 * const serializer = createSerializer('json');
 * const raw = createSerializer('query', { validate: false });
 * ```
 */
export function createSerializer(protocol: string, options: { validate?: boolean } = {}): Serializer {
  const factory = Object.hasOwn(SERIALIZERS, protocol) ? SERIALIZERS[protocol] : undefined;
  if (!factory) {
    throw new ConfigurationError(
      `Unknown protocol: ${protocol} (supported: ${supportedProtocols().join(', ')})`
    );
  }
  const serializer = factory();
  return options.validate === false ? serializer : new ValidatingSerializer(serializer);
}

/**
 * @throws {ConfigurationError} If the protocol is unknown
 */
export function createResponseParser(protocol: string): ResponseParser {
  const factory = Object.hasOwn(PARSERS, protocol) ? PARSERS[protocol] : undefined;
  if (!factory) {
    throw new ConfigurationError(
      `Unknown protocol: ${protocol} (supported: ${supportedProtocols().join(', ')})`
    );
  }
  return factory();
}
