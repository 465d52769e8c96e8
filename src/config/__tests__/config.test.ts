/**
 * Tests for client configuration
 */

import { describe, it, expect } from 'vitest';
import {
  ClientConfigBuilder,
  loadEnvironmentSettings,
  mergeClientConfig,
  resolveClientConfig,
  scopedSignatureVersion,
  userAgentFor,
} from '../index.js';
import { ConfigurationError } from '../../error/index.js';

describe('resolveClientConfig', () => {
  it('should apply defaults', () => {
    expect(resolveClientConfig()).toEqual({
      timeout: 60000,
      connectTimeout: 10000,
      parameterValidation: true,
    });
  });

  it('should reject invalid values', () => {
    expect(() => resolveClientConfig({ connectTimeout: 0 })).toThrow(ConfigurationError);
    expect(() => resolveClientConfig({ signatureVersion: '' })).toThrow(/^Invalid client configuration: signatureVersion:/);
  });
});

describe('mergeClientConfig', () => {
  it('should let later layers win field by field', () => {
    const base = resolveClientConfig({ timeout: 5000, userAgentExtra: 'base/1.0' });

    const merged = mergeClientConfig(base, { timeout: 1000 }, { parameterValidation: false, timeout: undefined });

    expect(merged).toEqual({
      timeout: 1000,
      connectTimeout: 10000,
      parameterValidation: false,
      userAgentExtra: 'base/1.0',
    });
  });
});

describe('userAgentFor', () => {
  it('should append the extra suffix', () => {
    expect(userAgentFor(resolveClientConfig())).toBe('model-client/0.1.0');
    expect(userAgentFor(resolveClientConfig({ userAgentExtra: 'deploy-tool/2.1' }))).toBe(
      'model-client/0.1.0 deploy-tool/2.1'
    );
  });
});

describe('ClientConfigBuilder', () => {
  it('should build from fluent setters', () => {
    const config = new ClientConfigBuilder()
      .signatureVersion('none')
      .timeout(30000)
      .connectTimeout(2000)
      .userAgentExtra('deploy-tool/2.1')
      .parameterValidation(false)
      .build();

    expect(config).toEqual({
      signatureVersion: 'none',
      timeout: 30000,
      connectTimeout: 2000,
      userAgentExtra: 'deploy-tool/2.1',
      parameterValidation: false,
    });
  });

  it('should read overrides from the environment', () => {
    const config = new ClientConfigBuilder()
      .fromEnv({
        MODEL_CLIENT_USER_AGENT: 'ci/7',
        MODEL_CLIENT_TIMEOUT: '2500',
        MODEL_CLIENT_PARAM_VALIDATION: 'FALSE',
      })
      .build();

    expect(config.userAgentExtra).toBe('ci/7');
    expect(config.timeout).toBe(2500);
    expect(config.parameterValidation).toBe(false);
  });

  it('should ignore a timeout that is not a number', () => {
    expect(new ClientConfigBuilder().fromEnv({ MODEL_CLIENT_TIMEOUT: 'soon' }).build().timeout).toBe(60000);
  });
});

describe('loadEnvironmentSettings', () => {
  it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
    expect(loadEnvironmentSettings('Widgets', { AWS_REGION: 'us-east-2', AWS_DEFAULT_REGION: 'eu-west-1' })).toEqual({
      regionName: 'us-east-2',
    });
  });

  it('should prefer the service endpoint URL over the global one', () => {
    const env = {
      AWS_ENDPOINT_URL: 'http://localhost:9000',
      AWS_ENDPOINT_URL_WIDGET_STORE: 'http://localhost:4566',
    };

    expect(loadEnvironmentSettings('Widget Store', env).endpointUrl).toBe('http://localhost:4566');
    expect(loadEnvironmentSettings('Gadgets', env).endpointUrl).toBe('http://localhost:9000');
  });

  it('should return nothing for an empty environment', () => {
    expect(loadEnvironmentSettings('Widgets', {})).toEqual({});
  });
});

describe('scopedSignatureVersion', () => {
  it('should accept either key style', () => {
    expect(scopedSignatureVersion({ widgets: { signature_version: 'none' } }, 'widgets')).toBe('none');
    expect(scopedSignatureVersion({ widgets: { signatureVersion: 's3v4' } }, 'widgets')).toBe('s3v4');
  });

  it('should ignore other services and sections without a version', () => {
    expect(scopedSignatureVersion({ gadgets: { signature_version: 'none' } }, 'widgets')).toBeUndefined();
    expect(scopedSignatureVersion({ widgets: { region: 'us-west-2' } }, 'widgets')).toBeUndefined();
    expect(scopedSignatureVersion(undefined, 'widgets')).toBeUndefined();
  });

  it('should reject a malformed section', () => {
    expect(() => scopedSignatureVersion({ widgets: { signature_version: 123 } }, 'widgets')).toThrow(
      'Invalid scoped configuration for widgets: signature_version: Expected string, received number'
    );
    expect(() => scopedSignatureVersion({ widgets: { signatureVersion: '' } }, 'widgets')).toThrow(
      ConfigurationError
    );
    expect(() => scopedSignatureVersion({ widgets: 'v4' }, 'widgets')).toThrow(
      'Invalid scoped configuration for widgets: Expected object, received string'
    );
  });
});
