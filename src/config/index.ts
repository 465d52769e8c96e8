/**
 * Client Configuration Module
 *
 * Per-client options, a fluent builder, environment loading and scoped
 * configuration lookups.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';

/**
 * Default total request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Default connection timeout in milliseconds.
 */
export const DEFAULT_CONNECT_TIMEOUT = 10000;

/**
 * Base user agent sent with every request.
 */
export const DEFAULT_USER_AGENT = 'model-client/0.1.0';

/**
 * Per-client configuration.
 *
 * @example
 * ```typescript
 * const config: ClientConfig = {
 *   signatureVersion: 'v4',
 *   timeout: 30000,
 *   connectTimeout: 5000,
 *   parameterValidation: true,
 * };
 * ```
 */
export interface ClientConfig {
  /**
   * Signature version that wins over every other source.
   */
  signatureVersion?: string;

  /**
   * Suffix appended to the user agent.
   *
   * @example 'my-app/1.0.0'
   */
  userAgentExtra?: string;

  /**
   * Total request timeout in milliseconds.
   * @default 60000
   */
  timeout: number;

  /**
   * Connection establishment timeout in milliseconds.
   * @default 10000
   */
  connectTimeout: number;

  /**
   * Validate parameters against the input shape before serializing.
   * @default true
   */
  parameterValidation: boolean;
}

/**
 * Zod schema for configuration validation.
 */
export const ClientConfigSchema = z.object({
  signatureVersion: z.string().min(1).optional(),
  userAgentExtra: z.string().min(1).optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
  connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT),
  parameterValidation: z.boolean().default(true),
});

/**
 * Configuration as callers may supply it: every field optional.
 */
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Validate a partial configuration and apply defaults.
 *
 * @throws {ConfigurationError} If a field is invalid
 */
export function resolveClientConfig(input: ClientConfigInput = {}): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid client configuration: ${issues.join(', ')}`);
  }
  return result.data;
}

/**
 * Merge configuration layers; later layers win field by field.
 */
export function mergeClientConfig(
  base: ClientConfig,
  ...overrides: ClientConfigInput[]
): ClientConfig {
  const merged: ClientConfigInput = { ...base };
  for (const override of overrides) {
    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return resolveClientConfig(merged);
}

/**
 * Build the user agent string for a configuration.
 */
export function userAgentFor(config: ClientConfig): string {
  return config.userAgentExtra ? `${DEFAULT_USER_AGENT} ${config.userAgentExtra}` : DEFAULT_USER_AGENT;
}

/**
 * Client configuration builder.
 *
 * @example
 * ```typescript
 * const config = new ClientConfigBuilder()
 *   .signatureVersion('v4')
 *   .timeout(30000)
 *   .userAgentExtra('deploy-tool/2.1')
 *   .build();
 * ```
 */
export class ClientConfigBuilder {
  private config: ClientConfigInput = {};

  /**
   * Force a signature version for every request.
   */
  signatureVersion(version: string): this {
    this.config.signatureVersion = version;
    return this;
  }

  userAgentExtra(extra: string): this {
    this.config.userAgentExtra = extra;
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Set connection timeout in milliseconds.
   */
  connectTimeout(ms: number): this {
    this.config.connectTimeout = ms;
    return this;
  }

  parameterValidation(enabled: boolean): this {
    this.config.parameterValidation = enabled;
    return this;
  }

  /**
   * Load configuration from environment variables.
   *
   * Reads:
   * - MODEL_CLIENT_USER_AGENT: User agent suffix
   * - MODEL_CLIENT_TIMEOUT: Request timeout (ms)
   * - MODEL_CLIENT_PARAM_VALIDATION: `false` disables validation
   */
  fromEnv(env: Record<string, string | undefined> = process.env): this {
    const userAgent = env.MODEL_CLIENT_USER_AGENT;
    if (userAgent) {
      this.config.userAgentExtra = userAgent;
    }

    const timeout = env.MODEL_CLIENT_TIMEOUT;
    if (timeout) {
      const parsed = Number.parseInt(timeout, 10);
      if (!Number.isNaN(parsed)) {
        this.config.timeout = parsed;
      }
    }

    const validation = env.MODEL_CLIENT_PARAM_VALIDATION?.trim().toLowerCase();
    if (validation === 'false') {
      this.config.parameterValidation = false;
    } else if (validation === 'true') {
      this.config.parameterValidation = true;
    }

    return this;
  }

  /**
   * Build the configuration.
   *
   * @throws {ConfigurationError} If a field is invalid
   */
  build(): ClientConfig {
    return resolveClientConfig(this.config);
  }
}

/**
 * Location settings read from the environment for one service.
 */
export interface EnvironmentSettings {
  regionName?: string;
  endpointUrl?: string;
}

/**
 * Read region and endpoint settings for a service from the environment.
 *
 * Reads `AWS_REGION` or `AWS_DEFAULT_REGION`, then
 * `AWS_ENDPOINT_URL_<SERVICE>` (service id upper-cased, non-alphanumerics
 * replaced with `_`) or `AWS_ENDPOINT_URL`.
 *
 * @example
 * ```typescript
 * loadEnvironmentSettings('widgets', { AWS_REGION: 'us-west-2' });
 * // { regionName: 'us-west-2' }
 * ```
 */
export function loadEnvironmentSettings(
  serviceId: string,
  env: Record<string, string | undefined> = process.env
): EnvironmentSettings {
  const settings: EnvironmentSettings = {};

  const region = env.AWS_REGION || env.AWS_DEFAULT_REGION;
  if (region) {
    settings.regionName = region;
  }

  const serviceKey = serviceId.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
  const endpointUrl = env[`AWS_ENDPOINT_URL_${serviceKey}`] || env.AWS_ENDPOINT_URL;
  if (endpointUrl) {
    settings.endpointUrl = endpointUrl;
  }

  return settings;
}

/**
 * Already-parsed, per-service configuration sections keyed by endpoint prefix.
 *
 * @example
 * ```typescript
 * const scoped: ScopedConfig = { widgets: { signature_version: 'v4' } };
 * ```
 */
export type ScopedConfig = Record<string, unknown>;

const ScopedServiceSectionSchema = z
  .object({
    signatureVersion: z.string().min(1).optional(),
    signature_version: z.string().min(1).optional(),
  })
  .passthrough();

/**
 * Signature version override in the scoped section for an endpoint prefix.
 *
 * Accepts both `signatureVersion` and `signature_version` keys.
 *
 * @throws {ConfigurationError} If the section is not an object or a
 * signature version key is not a non-empty string
 */
export function scopedSignatureVersion(
  scoped: ScopedConfig | undefined,
  endpointPrefix: string
): string | undefined {
  const section = scoped?.[endpointPrefix];
  if (section === undefined) {
    return undefined;
  }
  const parsed = ScopedServiceSectionSchema.safeParse(section);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
    );
    throw new ConfigurationError(
      `Invalid scoped configuration for ${endpointPrefix}: ${issues.join(', ')}`
    );
  }
  return parsed.data.signatureVersion ?? parsed.data.signature_version;
}
