import { describe, it, expect, beforeAll } from 'vitest';
import { EndpointResolver } from '../resolver.js';
import { FileLoader } from '../../model/loader.js';
import { ConfigurationError } from '../../error/index.js';

describe('EndpointResolver', () => {
  let resolver: EndpointResolver;

  beforeAll(async () => {
    resolver = EndpointResolver.fromRules(await new FileLoader().loadData('_endpoints'));
  });

  it('should build regional endpoints from the default rule', () => {
    expect(resolver.constructEndpoint('widgets', 'us-west-2')).toEqual({
      url: 'https://widgets.us-west-2.amazonaws.com',
      regionName: 'us-west-2',
      properties: {},
    });
  });

  it('should honour the scheme', () => {
    expect(resolver.constructEndpoint('widgets', 'eu-west-1', 'http').url).toBe(
      'http://widgets.eu-west-1.amazonaws.com'
    );
  });

  it('should apply earlier default rules first', () => {
    expect(resolver.constructEndpoint('widgets', 'cn-north-1')).toEqual({
      url: 'https://widgets.cn-north-1.amazonaws.com.cn',
      regionName: 'cn-north-1',
      properties: { signatureVersion: 'v4' },
    });
  });

  it('should prefer service rules and use the credential scope region', () => {
    const endpoint = resolver.constructEndpoint('iam', 'eu-central-1');
    expect(endpoint.url).toBe('https://iam.amazonaws.com');
    expect(endpoint.regionName).toBe('us-east-1');

    expect(resolver.constructEndpoint('iam', 'us-gov-west-1').url).toBe('https://iam.us-gov.amazonaws.com');
  });

  it('should resolve global endpoints without a region', () => {
    expect(resolver.constructEndpoint('sts')).toEqual({
      url: 'https://sts.amazonaws.com',
      regionName: 'us-east-1',
      properties: { credentialScope: { region: 'us-east-1' } },
    });
    expect(resolver.constructEndpoint('s3').url).toBe('https://s3.amazonaws.com');
    expect(resolver.constructEndpoint('s3', 'us-west-2').url).toBe('https://s3-us-west-2.amazonaws.com');
  });

  it('should fall through service rules that do not match', () => {
    expect(resolver.constructEndpoint('sts', 'eu-west-1').url).toBe('https://sts.eu-west-1.amazonaws.com');
    expect(resolver.constructEndpoint('s3', 'cn-north-1').url).toBe('https://s3.cn-north-1.amazonaws.com.cn');
  });

  it('should require a region for regional templates', () => {
    expect(() => resolver.constructEndpoint('widgets')).toThrow(
      'NoRegion: a region must be specified to create a widgets client'
    );
  });

  it('should report when no rule matches', () => {
    const strict = EndpointResolver.fromRules({
      _default: [{ uri: 'https://{service}.{region}.example.com', constraints: [['region', 'startsWith', 'xx-']] }],
    });

    expect(() => strict.constructEndpoint('widgets', 'us-west-2')).toThrow(
      'UnknownEndpoint: unable to construct an endpoint for widgets in region us-west-2'
    );
  });

  it('should reject malformed rules', () => {
    expect(() => EndpointResolver.fromRules({ _default: [{ constraints: [] }] })).toThrow(ConfigurationError);
  });
});
