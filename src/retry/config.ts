/**
 * Translation of declarative retry rules into a per-service configuration.
 *
 * @module retry/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import { formatZodIssues } from '../model/schema.js';

const ResponseConditionSchema = z
  .object({
    serviceErrorCode: z.string().min(1).optional(),
    httpStatusCode: z.number().int().optional(),
  })
  .refine((value) => value.serviceErrorCode !== undefined || value.httpStatusCode !== undefined, {
    message: 'response condition needs serviceErrorCode or httpStatusCode',
  });

const ConditionSchema = z.union([
  z.object({ response: ResponseConditionSchema }).strict(),
  z
    .object({ socketErrors: z.array(z.enum(['connection', 'timeout', 'malformed-response'])).min(1) })
    .strict(),
]);

export type RetryCondition = z.infer<typeof ConditionSchema>;

const PolicySchema = z.union([
  z.object({ $ref: z.string().min(1) }).strict(),
  z.object({ appliesWhen: ConditionSchema }).strict(),
]);

type Policy = z.infer<typeof PolicySchema>;

const DelaySchema = z.object({
  type: z.literal('exponential'),
  base: z.union([z.literal('rand'), z.number().nonnegative()]),
  growthFactor: z.number().positive(),
});

export type RetryDelay = z.infer<typeof DelaySchema>;

const SectionSchema = z.object({
  maxAttempts: z.number().int().positive().optional(),
  delay: DelaySchema.optional(),
  policies: z.record(PolicySchema).default({}),
});

type Section = z.infer<typeof SectionSchema>;

export const RetryRulesSchema = z.object({
  definitions: z.record(z.object({ appliesWhen: ConditionSchema }).strict()).default({}),
  retry: z
    .object({
      __default__: SectionSchema.extend({
        maxAttempts: z.number().int().positive(),
        delay: DelaySchema,
      }),
    })
    .catchall(z.record(SectionSchema)),
});

export type RetryRules = z.infer<typeof RetryRulesSchema>;

/**
 * Fully resolved retry settings for one scope.
 */
export interface RetrySection {
  /** Total attempts, the first one included */
  maxAttempts: number;
  delay: RetryDelay;
  /** Named conditions; any match asks for a retry */
  policies: Record<string, RetryCondition>;
}

/**
 * Retry settings for one endpoint prefix. Immutable once built.
 */
export class ServiceRetryConfig {
  constructor(
    public readonly endpointPrefix: string,
    private readonly defaults: RetrySection,
    private readonly operations: Readonly<Record<string, RetrySection>>
  ) {
    Object.freeze(this);
  }

  /**
   * Settings applying to an operation: its override when one exists,
   * otherwise the service default.
   */
  forOperation(operationName: string): RetrySection {
    return this.operations[operationName] ?? this.defaults;
  }

  get operationOverrides(): string[] {
    return Object.keys(this.operations);
  }
}

/**
 * Build the retry configuration for an endpoint prefix.
 *
 * Layers, lowest first: the global `__default__`, the service's
 * `__default__`, then each operation section. Policies merge by name;
 * `maxAttempts` and `delay` are replaced.
 *
 * @example
 * ```typescript
 * const config = translateRetryConfig(await loader.loadData('_retry'), 'widgets');
 * config.forOperation('DescribeWidgets').maxAttempts; // 5
 * ```
 *
 * @throws {ConfigurationError} If the rules are malformed or a `$ref` names no definition
 */
export function translateRetryConfig(raw: unknown, endpointPrefix: string): ServiceRetryConfig {
  const parsed = RetryRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid retry rules: ${formatZodIssues(parsed.error)}`);
  }
  const rules = parsed.data;
  const resolve = (policies: Record<string, Policy>): Record<string, RetryCondition> =>
    resolvePolicies(policies, rules.definitions);

  const globalDefaults: RetrySection = {
    maxAttempts: rules.retry.__default__.maxAttempts,
    delay: rules.retry.__default__.delay,
    policies: resolve(rules.retry.__default__.policies),
  };

  const serviceSections: Record<string, Section> =
    endpointPrefix === '__default__' ? {} : rules.retry[endpointPrefix] ?? {};

  const serviceDefault = serviceSections.__default__;
  const serviceDefaults = serviceDefault
    ? layer(globalDefaults, serviceDefault, resolve(serviceDefault.policies))
    : globalDefaults;

  const operations: Record<string, RetrySection> = {};
  for (const [name, section] of Object.entries(serviceSections)) {
    if (name !== '__default__') {
      operations[name] = layer(serviceDefaults, section, resolve(section.policies));
    }
  }

  return new ServiceRetryConfig(endpointPrefix, serviceDefaults, operations);
}

function layer(base: RetrySection, section: Section, policies: Record<string, RetryCondition>): RetrySection {
  return {
    maxAttempts: section.maxAttempts ?? base.maxAttempts,
    delay: section.delay ?? base.delay,
    policies: { ...base.policies, ...policies },
  };
}

function resolvePolicies(
  policies: Record<string, Policy>,
  definitions: Record<string, { appliesWhen: RetryCondition }>
): Record<string, RetryCondition> {
  const resolved: Record<string, RetryCondition> = {};
  for (const [name, policy] of Object.entries(policies)) {
    if ('$ref' in policy) {
      const definition = definitions[policy.$ref];
      if (!definition) {
        throw new ConfigurationError(
          `Retry policy ${name} references unknown definition: ${policy.$ref}`
        );
      }
      resolved[name] = definition.appliesWhen;
    } else {
      resolved[name] = policy.appliesWhen;
    }
  }
  return resolved;
}
