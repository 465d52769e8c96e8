/**
 * Endpoint module.
 *
 * @module endpoint
 */

export { EndpointResolver, EndpointRulesSchema } from './resolver.js';
export type {
  EndpointConstraint,
  EndpointProperties,
  EndpointRule,
  EndpointRules,
  ResolvedEndpoint,
} from './resolver.js';
export { Endpoint } from './endpoint.js';
export type { EndpointCall, EndpointOptions, EndpointResult } from './endpoint.js';
