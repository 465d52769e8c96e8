/**
 * Tests for credential providers
 */

import { describe, it, expect } from 'vitest';
import {
  ChainCredentialProvider,
  defaultCredentialProvider,
  EnvironmentCredentialProvider,
  StaticCredentialProvider,
} from '../index.js';
import type { AwsCredentials, CredentialProvider } from '../index.js';
import { CredentialError } from '../../error/index.js';

class CountingProvider implements CredentialProvider {
  calls = 0;

  constructor(private readonly result: AwsCredentials | Error) {}

  async getCredentials(): Promise<AwsCredentials> {
    this.calls += 1;
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

describe('StaticCredentialProvider', () => {
  it('should return a copy of the credentials', async () => {
    const provider = new StaticCredentialProvider({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session',
    });

    expect(await provider.getCredentials()).toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-session',
    });
    expect(provider.isExpired()).toBe(false);
  });

  it('should require both keys', () => {
    expect(() => new StaticCredentialProvider({ accessKeyId: 'test-access-key', secretAccessKey: '' })).toThrow(
      CredentialError
    );
  });

  it('should refuse expired credentials', async () => {
    const provider = new StaticCredentialProvider({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      expiration: new Date(0),
    });

    expect(provider.isExpired()).toBe(true);
    await expect(provider.getCredentials()).rejects.toThrow('Static credentials have expired');
  });
});

describe('EnvironmentCredentialProvider', () => {
  it('should read and trim the environment variables', async () => {
    const provider = new EnvironmentCredentialProvider({
      AWS_ACCESS_KEY_ID: ' test-access-key ',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });

    expect(await provider.getCredentials()).toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    });
  });

  it('should include the session token when set', async () => {
    const provider = new EnvironmentCredentialProvider({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-session',
    });

    expect((await provider.getCredentials()).sessionToken).toBe('test-session');
  });

  it('should fail when the secret is missing', async () => {
    const provider = new EnvironmentCredentialProvider({ AWS_ACCESS_KEY_ID: 'test-access-key' });

    await expect(provider.getCredentials()).rejects.toThrow(
      'AWS_SECRET_ACCESS_KEY environment variable not set or empty'
    );
  });
});

describe('ChainCredentialProvider', () => {
  const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

  it('should require at least one provider', () => {
    expect(() => new ChainCredentialProvider([])).toThrow(CredentialError);
  });

  it('should return the first provider that succeeds', async () => {
    const failing = new CountingProvider(new Error('nothing here'));
    const working = new CountingProvider(credentials);
    const chain = new ChainCredentialProvider([failing, working]);

    expect(await chain.getCredentials()).toEqual(credentials);
    expect(await chain.getCredentials()).toEqual(credentials);

    expect(failing.calls).toBe(1);
    expect(working.calls).toBe(2);
    expect(chain.isExpired()).toBe(false);
  });

  it('should list every failure', async () => {
    const chain = new ChainCredentialProvider([
      new CountingProvider(new Error('first failed')),
      new CountingProvider(new Error('second failed')),
    ]);

    await expect(chain.getCredentials()).rejects.toThrow(
      'Could not load credentials from any provider in the chain:\n' +
        '  1. CountingProvider: first failed\n' +
        '  2. CountingProvider: second failed'
    );
  });

  it('should read the given environment by default', async () => {
    const chain = defaultCredentialProvider({
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });

    expect(await chain.getCredentials()).toEqual(credentials);
  });
});
