/**
 * Endpoint resolution from declarative rules.
 *
 * @module endpoint/resolver
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import { formatZodIssues } from '../model/schema.js';

const ConstraintSchema = z.tuple([
  z.literal('region'),
  z.enum(['startsWith', 'notStartsWith', 'equals', 'notEquals', 'oneOf']),
  z.union([z.string(), z.null(), z.array(z.union([z.string(), z.null()]))]),
]);

export type EndpointConstraint = z.infer<typeof ConstraintSchema>;

const EndpointPropertiesSchema = z
  .object({
    credentialScope: z.object({ region: z.string().optional() }).optional(),
    signatureVersion: z.string().optional(),
  })
  .passthrough();

export type EndpointProperties = z.infer<typeof EndpointPropertiesSchema>;

const EndpointRuleSchema = z.object({
  uri: z.string().min(1),
  constraints: z.array(ConstraintSchema).default([]),
  properties: EndpointPropertiesSchema.default({}),
});

export type EndpointRule = z.infer<typeof EndpointRuleSchema>;

export const EndpointRulesSchema = z.record(z.array(EndpointRuleSchema));

export type EndpointRules = z.infer<typeof EndpointRulesSchema>;

/**
 * Result of resolving an endpoint.
 */
export interface ResolvedEndpoint {
  /** Base URL, e.g. `https://widgets.us-west-2.amazonaws.com` */
  url: string;
  /** Region to sign for; the credential scope region when the rule sets one */
  regionName?: string;
  properties: EndpointProperties;
}

/**
 * Maps (service, region, scheme) to a base URL using ordered rules.
 *
 * A service's own rules are tried first, then the `_default` rules; the
 * first rule whose constraints all hold wins.
 *
 * @example
 * ```typescript
 * const resolver = EndpointResolver.fromRules(await loader.loadData('_endpoints'));
 * resolver.constructEndpoint('widgets', 'us-west-2');
 * // { url: 'https://widgets.us-west-2.amazonaws.com', regionName: 'us-west-2', properties: {} }
 * ```
 */
export class EndpointResolver {
  constructor(private readonly rules: EndpointRules) {}

  /**
   * @throws {ConfigurationError} If the rules are malformed
   */
  static fromRules(raw: unknown): EndpointResolver {
    const result = EndpointRulesSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(`Invalid endpoint rules: ${formatZodIssues(result.error)}`);
    }
    return new EndpointResolver(result.data);
  }

  /**
   * @param regionName - May be omitted for global endpoints
   * @throws {ConfigurationError} `NoRegion` when a matching rule needs a region;
   *   `UnknownEndpoint` when no rule matches
   */
  constructEndpoint(
    serviceName: string,
    regionName?: string,
    scheme: 'https' | 'http' = 'https'
  ): ResolvedEndpoint {
    const region = regionName ?? null;
    const candidates = [...(this.rules[serviceName] ?? []), ...(this.rules._default ?? [])];

    for (const rule of candidates) {
      if (!rule.constraints.every((constraint) => constraintHolds(constraint, region))) {
        continue;
      }
      if (region === null && rule.uri.includes('{region}')) {
        throw new ConfigurationError(
          `NoRegion: a region must be specified to create a ${serviceName} client`
        );
      }
      const url = rule.uri
        .replace(/\{scheme\}/g, scheme)
        .replace(/\{service\}/g, serviceName)
        .replace(/\{region\}/g, region ?? '');
      return {
        url,
        regionName: rule.properties.credentialScope?.region ?? regionName,
        properties: rule.properties,
      };
    }

    throw new ConfigurationError(
      `UnknownEndpoint: unable to construct an endpoint for ${serviceName} in region ${region ?? '(none)'}`
    );
  }
}

function constraintHolds([, operator, expected]: EndpointConstraint, region: string | null): boolean {
  switch (operator) {
    case 'startsWith':
      return region !== null && typeof expected === 'string' && region.startsWith(expected);
    case 'notStartsWith':
      return !(region !== null && typeof expected === 'string' && region.startsWith(expected));
    case 'equals':
      return region === expected;
    case 'notEquals':
      return region !== expected;
    case 'oneOf':
      return Array.isArray(expected) && expected.includes(region);
  }
}
